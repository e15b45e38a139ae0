import { logger } from '@stageout/shared';

const log = logger.child({ module: 'proxy-env' });

/**
 * Run `fn` with HTTP_PROXY removed from the environment, putting the previous
 * value back once it settles.
 */
export async function withoutHttpProxy<T>(fn: () => Promise<T>, env: NodeJS.ProcessEnv = process.env): Promise<T> {
  const previous = env.HTTP_PROXY;
  delete env.HTTP_PROXY;
  log.info({ httpProxy: previous }, 'unset HTTP_PROXY');
  try {
    return await fn();
  } finally {
    if (previous !== undefined) {
      env.HTTP_PROXY = previous;
      log.info({ httpProxy: previous }, 'restored HTTP_PROXY');
    }
  }
}
