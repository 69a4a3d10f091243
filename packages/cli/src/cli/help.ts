/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
relaygen - request handler registration generator v${VERSION}

USAGE:
  relaygen <command> [options]

COMMANDS:
  generate                  Write the registration module
  list                      List discovered handlers in registration order
  check                     Exit 1 when the registration module is out of date

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output (lists skipped classes)
  -q, --quiet               Suppress output except errors
  -c, --config <file>       Config file path (default: relaygen.json)

DISCOVERY OPTIONS:
  -s, --src <dir>           Source root directory (default: src)
  -o, --out <file>          Output file (default: src/generated/service-registration-extensions.ts)
  --tsconfig <file>         Use a tsconfig.json's files and compiler options
  --catalog <file>          Read a JSON type catalog instead of TypeScript sources
  --timestamp               Add an informational generation timestamp

Value options also take an inline value: --out=src/registrations.ts

EXAMPLES:
  relaygen generate
  relaygen list --verbose
  relaygen check --quiet
  relaygen generate --tsconfig tsconfig.json -o src/registrations.ts
`);
};
