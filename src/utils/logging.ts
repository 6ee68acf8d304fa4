import pino from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectorSink(): { logs: string[]; sink: Writable } {
  const logs: string[] = [];
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logs, sink };
}

// Logs go to stderr: stdout is reserved for operator-facing output of the CLI.
export function getLogger() {
  if (!loggerInstance) {
    const cfg = loadConfig();
    const base = { level: cfg.logging.level, base: { app: 'ec2-evidence' } };
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = pino(base, collectorSink().sink);
    } else if (cfg.logging.json) {
      loggerInstance = pino(base, pino.destination(2));
    } else {
      loggerInstance = pino({
        ...base,
        transport: { target: 'pino-pretty', options: { destination: 2 } },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level: pino.LevelWithSilent = 'info') {
  const { logs, sink } = collectorSink();
  loggerInstance = pino({ level, base: { app: 'ec2-evidence' } }, sink);
  return logs;
}
