import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createOrchestrator } from '../../orchestrator/index.js';
import { FixedWindowRateLimiter } from '../../rate-limit/fixed-window-limiter.js';
import { ResourceManager } from '../../resources/index.js';
import { startServer, stopServer, API_PREFIX } from '../../server/index.js';
import {
  print,
  printError,
  formatError,
  formatWarning,
  formatValidationErrors,
  bold,
  cyan,
} from '../formatter.js';

/**
 * Schema for serve command options. Unset options fall back to the
 * environment configuration.
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  corsOrigin: z.string().optional(),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the crawl control HTTP server')
    .option('-p, --port <port>', 'Port to listen on (default: CRAWL_PORT or 8000)')
    .option('-H, --host <host>', 'Host to bind to (default: CRAWL_HOST or 0.0.0.0)')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the serve command.
 */
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options: ServeOptions = optionsResult.data;
  const config = getConfig();

  const port = options.port ?? config.port;
  const host = options.host ?? config.host;
  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : config.corsOrigins;

  print(`Starting crawl control server...`);
  print('');
  print(`${bold('Port:')} ${cyan(String(port))}`);
  print(`${bold('Host:')} ${cyan(host)}`);
  print(`${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print(`${bold('Cache:')} ${cyan(config.cacheBackend)}`);
  print(`${bold('Database:')} ${cyan(config.databaseUrl ? 'configured' : 'not configured')}`);
  print('');

  if (!config.apiKey) {
    print(formatWarning('CRAWL_API_KEY is not set; mutating routes are unauthenticated'));
  }

  const resources = ResourceManager.fromConfig(config);
  try {
    await resources.init();
  } catch (error) {
    await resources.close();
    throw error;
  }

  const orchestrator = createOrchestrator({ cache: resources.cache, config });
  const rateLimiter = config.rateLimit.enabled
    ? new FixedWindowRateLimiter(resources.cache, {
        maxRequests: config.rateLimit.maxRequests,
        windowSeconds: config.rateLimit.windowSeconds,
      })
    : undefined;

  const server = await startServer({
    orchestrator,
    resources,
    rateLimiter,
    apiKey: config.apiKey,
    port,
    host,
    corsOrigins,
  });

  // Running jobs first, then the listener, then the clients they use
  const shutdown = (signal: NodeJS.Signals): void => {
    print('');
    print(`Received ${signal}, shutting down...`);
    orchestrator
      .shutdown()
      .then(() => stopServer(server))
      .then(() => resources.close())
      .then((errors) => {
        print('Server stopped');
        process.exit(errors.length === 0 ? 0 : 1);
      })
      .catch((err: unknown) => {
        printError(formatError(err instanceof Error ? err.message : String(err)));
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('POST')} ${API_PREFIX}/spiders/run                 - Launch a spider`);
  print(`  ${cyan('GET')}  ${API_PREFIX}/spiders/tasks               - List tasks`);
  print(`  ${cyan('GET')}  ${API_PREFIX}/spiders/tasks/:taskId       - Task status`);
  print(`  ${cyan('POST')} ${API_PREFIX}/spiders/tasks/:taskId/stop  - Stop a task`);
  print(`  ${cyan('GET')}  ${API_PREFIX}/spiders/results/:taskId     - Harvested records`);
  print(`  ${cyan('GET')}  ${API_PREFIX}/monitoring/health           - Dependency health`);
  print(`  ${cyan('GET')}  /health/ready                         - Readiness check`);
  print('');
  print('Press Ctrl+C to stop the server');
}
