import { Reporter } from '../../src/lib/reporter.js';

export interface RecordingReporter extends Reporter {
  lines: string[];
}

export function recordingReporter(): RecordingReporter {
  const lines: string[] = [];
  return {
    debug(message) {
      lines.push(`debug: ${message}`);
    },
    info(message) {
      lines.push(`info: ${message}`);
    },
    lines,
    success(message) {
      lines.push(`success: ${message}`);
    },
    warn(message) {
      lines.push(`warn: ${message}`);
    },
  };
}
