import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * REFSTORE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent. Storage failures are non-fatal, so nothing is printed
 * unless someone asks.
 */
function createRootLogger(env: Record<string, string | undefined>): Logger {
  return pino(
    {
      level: parseLogLevel(env['REFSTORE_LOG_LEVEL']),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // stderr, synchronous: stdout belongs to the host process
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger(process.env);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
