/**
 * Test Setup
 * Installs a silent logger before any module under test takes its own.
 */

import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

setLogger(pino({ level: 'silent' }));
