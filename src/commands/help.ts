/**
 * CLI help text.
 */
import { logger } from "../logger.js";

export function help(): void {
  logger.info(`
mx-testbed - Build, start, test and tear down a homeserver with its modules

Usage:
  mx-testbed [build] [up] [run] [down] [options]

Commands (executed in this order, default: up run down):
  build                        Build the server image with every module
  up                           Start the server and provision users and rooms
  run                          Run the test scripts
  down                         Run teardown scripts, stop the server

Options:
  -c, --config <file>          Suite configuration (default: mx-testbed.yml)
  -u, --username <name>        Registry user name
  -p, --password <password>    Registry password
  --server <address>           Registry address
  --root <dir>                 Directory holding build artifacts and logs
  --workers                    Run the server in worker mode
  --workers-resources <dir>    Directory holding workers_start.py and conf/
  --synapse-tag <tag>          Base image matrixdotorg/synapse:<tag>
  --no-autoclean-on-error      Keep containers when up fails
  -h, --help                   Show this help

Environment:
  LOG_LEVEL                    debug, info, warn or error (default: info)
`);
}
