import { createApp } from './app.js';
import { ensureScratchDirectories } from './bootstrap/scratchDirectories.js';
import { env } from './config/env.js';
import { initializeServices, shutdownServices } from './services/index.js';

async function main(): Promise<void> {
  const paths = ensureScratchDirectories(env.SCRATCH_DIR);
  console.log(`📁 Scratch directories ready: ${paths.uploads}, ${paths.cachedChunks}`);

  await initializeServices(env.SCRATCH_DIR);

  const app = createApp({ lambda: false });

  // Start server
  const server = app.listen(env.PORT, () => {
    console.log(`🚀 Server running on port ${env.PORT}`);
    console.log(`📍 Environment: ${env.NODE_ENV}`);
  });

  // Graceful shutdown
  function shutdown(signal: string): void {
    console.log(`\n${signal} received, shutting down gracefully...`);

    server.close(() => {
      console.log('HTTP server closed');
      shutdownServices().then(
        () => {
          console.log('Database connections closed');
          process.exit(0);
        },
        (error: unknown) => {
          console.error('Failed to close database connections:', error);
          process.exit(1);
        },
      );
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forcing shutdown...');
      process.exit(1);
    }, 10000);
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
