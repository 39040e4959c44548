// Starts the HTTP server; runtime flow is process boot -> runCli(argv) -> createApp() -> listen(host, port).
import { runCli } from "./cli/run.js";

await runCli(process.argv.slice(2));
