import type { Logger } from 'pino';

export type DiagnosticLevel = 'debug' | 'info' | 'warn';

export interface DescriptorDiagnostic {
  level: DiagnosticLevel;
  event: string;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Sink for decoder diagnostics. The scanner and resolver never log on their
 * own; whoever runs them decides where the messages go.
 */
export type DescriptorObserver = (diagnostic: DescriptorDiagnostic) => void;

export const silentObserver: DescriptorObserver = () => undefined;

export function createLoggerObserver(logger: Logger, context: Record<string, unknown> = {}): DescriptorObserver {
  return ({ level, event, message, data }) => {
    logger[level]({ event, ...context, ...data }, message);
  };
}

/** Collects diagnostics in memory, mostly for tests and the CLI `--verbose` mode. */
export function createRecordingObserver(): DescriptorObserver & { diagnostics: DescriptorDiagnostic[] } {
  const diagnostics: DescriptorDiagnostic[] = [];
  const observer = (diagnostic: DescriptorDiagnostic) => {
    diagnostics.push(diagnostic);
  };
  return Object.assign(observer, { diagnostics });
}
