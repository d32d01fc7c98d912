/**
 * Jest environment file
 * Runs before any module under test is imported, so the config module
 * validates these values.
 */

import os from 'os';
import path from 'path';

process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests
process.env.RATE_LIMIT_MAX_REQUESTS = '10000';
process.env.RULES_DIR = path.join(__dirname, '..', 'data');
process.env.UPLOADS_DIR = path.join(os.tmpdir(), 'charge-mapping-test', 'uploads');
process.env.RESULTS_DIR = path.join(os.tmpdir(), 'charge-mapping-test', 'results');
