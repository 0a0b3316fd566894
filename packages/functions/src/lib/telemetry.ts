import appInsights from "applicationinsights";

const connectionString = process.env.APPLICATIONINSIGHTS_CONNECTION_STRING?.trim();

let client: appInsights.TelemetryClient | null = null;

if (connectionString) {
  appInsights
    .setup(connectionString)
    // The Functions host already reports requests and exceptions.
    .setAutoCollectRequests(false)
    .setAutoCollectExceptions(false)
    .setAutoCollectDependencies(true)
    .setAutoCollectConsole(false)
    .start();

  client = appInsights.defaultClient;
}

type TelemetryProperties = Record<string, unknown>;

function stringifyProperties(properties?: TelemetryProperties): Record<string, string> | undefined {
  if (!properties) return undefined;

  const entries = Object.entries(properties)
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([key, value]) => [key, typeof value === "string" ? value : JSON.stringify(value)] as const);

  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/** Runs a telemetry call, ignoring failures so they never reach the caller. */
function report(send: (telemetry: appInsights.TelemetryClient) => void): void {
  if (!client) return;
  try {
    send(client);
  } catch (error) {
    console.warn(
      `[telemetry] Failed to send telemetry: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function trackEvent(name: string, properties?: TelemetryProperties): void {
  report((telemetry) => telemetry.trackEvent({ name, properties: stringifyProperties(properties) }));
}

export function trackMetric(name: string, value: number, properties?: TelemetryProperties): void {
  report((telemetry) =>
    telemetry.trackMetric({ name, value, properties: stringifyProperties(properties) })
  );
}

export function trackException(error: unknown, properties?: TelemetryProperties): void {
  const exception = error instanceof Error ? error : new Error(String(error));
  report((telemetry) =>
    telemetry.trackException({ exception, properties: stringifyProperties(properties) })
  );
}
