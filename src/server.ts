import { createApp, cleanupOldStorageFiles } from './app';
import { PORT, STORAGE_DIR, STORAGE_MAX_AGE_MS, UPLOAD_MAX_BYTES } from './config/splitConfig';

// Clean up orphaned files on startup
cleanupOldStorageFiles(STORAGE_DIR, STORAGE_MAX_AGE_MS);

const { app } = createApp({
  storageDir: STORAGE_DIR,
  maxUploadBytes: UPLOAD_MAX_BYTES,
  resultTtlMs: STORAGE_MAX_AGE_MS,
});

// Handle uncaught exceptions
process.on('uncaughtException', (err: Error) => {
  console.error('UNCAUGHT EXCEPTION! Shutting down...');
  console.error(err.name, err.message);
  console.error(err.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED REJECTION! Shutting down...');
  console.error(reason);
  process.exit(1);
});

process.on('SIGTERM', () => {
  console.log('SIGTERM received, shutting down...');
  process.exit(0);
});

process.on('SIGINT', () => {
  console.log('SIGINT received, shutting down...');
  process.exit(0);
});

app.listen(PORT, () => {
  console.log(`CSV split server running on port ${PORT}`);
  console.log(`Storage directory: ${STORAGE_DIR}`);
});
