import pino from 'pino';

export const logger = pino({
  name: 'deed-validation',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createRecordLogger(documentId?: string, source?: string) {
  return logger.child({
    ...(documentId !== undefined && { documentId }),
    ...(source !== undefined && { source }),
  });
}
