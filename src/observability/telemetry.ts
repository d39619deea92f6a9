import { logs, SeverityNumber } from '@opentelemetry/api-logs';
import { metrics } from '@opentelemetry/api';

const INSTRUMENTATION_NAME = 'governance-pipeline';

export type EventAttributes = Record<string, string | number | boolean>;

/**
 * OpenTelemetry wiring for the governance pipeline.
 *
 * Only the API packages are used here: events go to the global logger
 * provider and metrics to the global meter provider. Register an SDK with
 * exporters before startup to ship them anywhere; without one the calls are
 * no-ops.
 */

export function isTelemetryEnabled(): boolean {
  return process.env.GOVERNANCE_ENABLE_TELEMETRY === '1';
}

export function initTelemetry(): void {
  if (!isTelemetryEnabled()) {
    console.log('[Telemetry] Disabled (set GOVERNANCE_ENABLE_TELEMETRY=1 to enable)');
    return;
  }

  console.log('[Telemetry] Enabled');
  if (process.env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    console.log(`[Telemetry] OTLP endpoint: ${process.env.OTEL_EXPORTER_OTLP_ENDPOINT}`);
  }
}

export async function shutdownTelemetry(): Promise<void> {
  if (!isTelemetryEnabled()) {
    return;
  }
  console.log('[Telemetry] Shutdown');
}

export function getLogger(name: string = INSTRUMENTATION_NAME) {
  return logs.getLogger(name);
}

export function getMeter(name: string = INSTRUMENTATION_NAME) {
  return metrics.getMeter(name);
}

/**
 * Emit a structured event through the OTEL logs API, or to the console
 * when no logger provider can take it
 */
export function emitEvent(eventName: string, attributes: EventAttributes): void {
  if (!isTelemetryEnabled()) {
    return;
  }

  const timestamp = new Date().toISOString();

  try {
    getLogger().emit({
      severityNumber: SeverityNumber.INFO,
      severityText: 'INFO',
      body: eventName,
      attributes: {
        'event.name': eventName,
        'event.timestamp': timestamp,
        ...attributes,
      },
    });
  } catch (error) {
    console.log(`[Event] ${eventName}`, JSON.stringify({ timestamp, ...attributes }), error);
  }
}
