/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("@relaygen/cli/package.json") as { version: string };

export const VERSION = packageJson.version;
