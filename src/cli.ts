#!/usr/bin/env node

import { createProgram } from "./program";
import { exitWithError } from "./utils/ui";

createProgram().parseAsync().catch(exitWithError);
