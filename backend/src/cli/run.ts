import type { Server } from "node:http";
import { createApp } from "../app.js";
import { getBackendLoggingConfigSnapshot, logBackendEvent } from "../logging/logger.js";
import { parseCliArgs } from "./args.js";

function toLaunchUrl(host: string, port: number): string {
  const launchHost = host === "0.0.0.0" ? "localhost" : host;
  return `http://${launchHost}:${port}`;
}

async function listen(app: ReturnType<typeof createApp>, host: string, port: number): Promise<Server> {
  return await new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("error", reject);
    server.once("listening", () => resolve(server));
  });
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<Server | null> {
  try {
    const parsed = parseCliArgs(argv, env);

    if (parsed.kind === "help") {
      console.log(parsed.message);
      return null;
    }

    const { host, port } = parsed.options;

    logBackendEvent("app", "info", "server:boot", {
      port,
      host,
      nodeEnv: env.NODE_ENV ?? "development",
      logging: getBackendLoggingConfigSnapshot(),
    });

    const server = await listen(createApp(), host, port);

    logBackendEvent("app", "info", "server:listening", {
      url: toLaunchUrl(host, port),
    });

    return server;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unable to start hello-api.";
    console.error(`[hello-api] ${message}`);
    process.exitCode = 1;
    return null;
  }
}
