#!/usr/bin/env node
/**
 * csvrow CLI
 */

import { main } from "./main.js";

process.exitCode = main(process.argv.slice(2));
