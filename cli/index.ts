#!/usr/bin/env node
/**
 * baseguard CLI entry point
 */

import { createProgram } from './program.js';

createProgram().parse();
