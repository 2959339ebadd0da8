#!/usr/bin/env node

/**
 * plotstyle: shared style profile for analysis figures.
 */

import { createProgram } from "./cli.js";

createProgram().parse();
