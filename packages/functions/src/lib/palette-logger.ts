export interface PaletteLogger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
}

export const silentLogger: PaletteLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
