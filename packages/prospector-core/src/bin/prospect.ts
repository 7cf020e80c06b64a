/**
 * Operator CLI: call one prospecting tool and print its JSON response.
 *
 * Usage: node --import tsx packages/prospector-core/src/bin/prospect.ts search "CIO Saudi Aramco" --max 3
 */
import { runCli } from "../cli.js";

runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
}).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`prospect: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
