import morgan, { StreamOptions } from 'morgan';
import { Request } from 'express';
import { logger } from '../utils';
import { env } from '../config';

// Morgan stream for Winston, at the http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Health probes and tests are not logged
const skip = (req: Request): boolean => {
  return env.NODE_ENV === 'test' || req.originalUrl.startsWith(`${env.API_PREFIX}/health`);
};

// Dev format includes the request size (CSV uploads)
const format =
  env.NODE_ENV === 'production'
    ? 'combined'
    : ':method :url :status in=:req[content-length] out=:res[content-length] - :response-time ms';

export const requestLogger = morgan(format, { stream, skip });

export default requestLogger;
