export async function register(): Promise<void> {
  // Only run on the Node.js server (not Edge Runtime)
  if (process.env.NEXT_RUNTIME !== 'nodejs') {
    return;
  }

  const { readFile } = await import('fs/promises');
  const path = await import('path');
  const { default: logger } = await import('@/lib/logger');

  const getVersion = async (): Promise<string> => {
    try {
      const pkg: unknown = JSON.parse(await readFile(path.join(process.cwd(), 'package.json'), 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch (error) {
      logger.debug({ error }, 'package.json not readable');
    }
    return 'unknown';
  };

  logger.info({ version: await getVersion() }, 'Application starting');

  const { fetchIpcaHistory } = await import('@/lib/bcb');

  // Warm the IPCA cache in the background, don't block server startup
  fetchIpcaHistory()
    .then((history) => {
      logger.info({ months: history.length, latest: history.at(-1)?.period }, 'IPCA history cached');
    })
    .catch((error: unknown) => {
      logger.error({ error }, 'IPCA cache warm-up failed');
    });
}
