import type { Logger } from '@price-sentinel/logger';
import { FileSessionStore } from '@price-sentinel/session-store';
import type { Config } from '../config/index.js';

export function openSessionStore(config: Config, logger: Logger): FileSessionStore {
  return new FileSessionStore(logger.child({ component: 'session' }), {
    ticker: config.tracker.ticker,
    sessionDir: config.session.dir,
  });
}
