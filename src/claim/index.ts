import { runClaim } from "./command";

process.exitCode = runClaim({
  argv: process.argv.slice(2),
  env: process.env,
  stdout: process.stdout,
});
