/**
 * Test Setup
 *
 * Global setup that runs before each test file.
 */

import os from 'os';
import path from 'path';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.REPORTS_DIR = path.join(os.tmpdir(), 'weekly-report-stream-tests');
process.env.SERVER_MODE = 'streaming';
