#!/usr/bin/env node
/**
 * CLI tool to decode a DHCPv6 DUID given as a hex string.
 *
 * Usage:
 *   decode-duid <DUID_hex_string> [--verbose | --json]
 *
 * Colons in the hex string are ignored. Prints the decoded DUID on stdout;
 * exits 1 on bad arguments, invalid hex or a malformed DUID.
 *
 * `npm run build` compiles this file to dist/cli/decode-duid.js, the
 * `decode-duid` bin, which runs under plain node. During development run it
 * from sources with `npm run decode -- <args>`.
 *
 * Examples:
 *   decode-duid 00:01:00:01:2c:3d:4e:5f:aa:bb:cc:dd:ee:ff
 *   decode-duid 000200000009010203 --json
 *   NO_COLOR=1 decode-duid 00:03:00:01:aa:bb:cc:dd:ee:ff -v
 */

import { consoleOutput, runDecodeDuid, shouldUseColor } from '../src/cli/decodeDuidCommand.js';

function main(): void {
  const code = runDecodeDuid(process.argv.slice(2), consoleOutput, {
    color: shouldUseColor(process.stdout, process.env),
  });
  process.exit(code);
}

main();
