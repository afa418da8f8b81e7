#!/usr/bin/env node
/**
 * texscribe CLI entry point
 */

import { createProgram } from './command.js';

createProgram().parse();
