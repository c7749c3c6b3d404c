import { start } from './bootstrap/main.js';
import { describeError } from './infra/logger/logger.js';

try {
  const runtime = await start();
  const shutdown = (): void => {
    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        runtime.logger.error('bootstrap', `Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
} catch (error) {
  console.error('[bootstrap] Failed to start:', error);
  process.exit(1);
}
