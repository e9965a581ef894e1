import { runCli } from "./program";

process.exitCode = runCli(process.argv.slice(2));
