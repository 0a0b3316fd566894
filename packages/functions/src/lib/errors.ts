import type { PaletteErrorBody, PaletteErrorStage } from "imgpal-shared";

export class PaletteError extends Error {
  readonly stage: PaletteErrorStage;

  constructor(message: string, stage: PaletteErrorStage) {
    super(message);
    this.name = "PaletteError";
    this.stage = stage;
  }

  toBody(): PaletteErrorBody {
    return { error: this.message, stage: this.stage };
  }
}

/** A precondition on the pipeline inputs does not hold; nothing was computed. */
export class InvalidParameterError extends PaletteError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`Invalid ${parameter}: ${message}`, "validation");
    this.name = "InvalidParameterError";
    this.parameter = parameter;
  }

  override toBody(): PaletteErrorBody {
    return { error: this.message, parameter: this.parameter };
  }
}

/**
 * The trims removed every pixel. `thresholds` holds the values that were
 * in force at the failing stage so callers can loosen them.
 */
export class EmptyDistributionError extends PaletteError {
  readonly thresholds: Record<string, unknown>;

  constructor(stage: Exclude<PaletteErrorStage, "validation">, thresholds: Record<string, unknown>) {
    const label = stage === "bw-trim" ? "near-black/near-white trim" : "brightness/saturation quantile trim";
    super(`No pixels left after ${label}`, stage);
    this.name = "EmptyDistributionError";
    this.thresholds = thresholds;
  }

  override toBody(): PaletteErrorBody {
    return { error: this.message, stage: this.stage, thresholds: this.thresholds };
  }
}
