#!/usr/bin/env node
/**
 * diffy CLI entry point.
 */

import { createProgram, handleError } from "./commands/program.js";
import { getVersion } from "./core/version.js";

const program = createProgram({ version: await getVersion() });

program.parseAsync().catch(handleError);
