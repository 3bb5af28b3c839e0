import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../config/env.js';
import type { Account } from '../shared/types.js';

export type { Logger };

export const logger: Logger = pino({
  name: 'mailmirror',
  level: env.logLevel,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
  },
});

export const createAccountLogger = (account: Pick<Account, 'name'>, parent: Logger = logger): Logger =>
  parent.child({ account: account.name });
