/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
wirebridge - wire/domain conversion generator v${VERSION}

USAGE:
  wirebridge <command> [input] [options]

COMMANDS:
  generate [input]          Generate the conversions module
  plan [input]              Print the conversion plan of every declaration

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: wirebridge.json)

GENERATE/PLAN OPTIONS:
  -o, --out <file>          Output module (default: stdout)
  -w, --wire <file>         Wire module source, read for enum members
  -n, --namespace <name>    Wire namespace import alias
  --strict-aggregates       Require explicit optionality for aggregate fields

EXAMPLES:
  wirebridge generate src/domain.ts -o src/conversions.ts
  wirebridge generate -w src/gen/wire.ts
  wirebridge plan src/domain.ts --strict-aggregates
`);
};
