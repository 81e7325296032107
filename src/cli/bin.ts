#!/usr/bin/env node
/**
 * Executable entry for the `video-qa` bin. Loads `.env` before any
 * configuration is read.
 *
 * @module cli/bin
 */

import 'dotenv/config';
import { main } from './index.js';

void main();
