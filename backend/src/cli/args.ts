export type CliOptions = {
  port: number;
  host: string;
};

export type CliParseResult =
  | {
      kind: "help";
      message: string;
    }
  | {
      kind: "run";
      options: CliOptions;
    };

export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgsError";
  }
}

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = "127.0.0.1";
const MIN_PORT = 1;
const MAX_PORT = 65535;

export function formatHelp(binaryName = "hello-api"): string {
  return [
    "Hello API server",
    "",
    "Usage:",
    `  ${binaryName} [--port <number>] [--host <host>]`,
    "",
    "Examples:",
    `  ${binaryName}`,
    `  ${binaryName} --port 4000 --host 0.0.0.0`,
    "",
    "Options:",
    `  -p, --port <number>   API server port (env: PORT, default: ${DEFAULT_PORT})`,
    `      --host <host>     Host interface (env: HOST, default: ${DEFAULT_HOST})`,
    "  -h, --help            Show help",
  ].join("\n");
}

function parsePort(raw: string): number {
  const parsed = Number(raw);

  if (raw.trim() === "" || !Number.isInteger(parsed) || parsed < MIN_PORT || parsed > MAX_PORT) {
    throw new CliArgsError(`Invalid port: ${raw}. Use an integer between ${MIN_PORT}-${MAX_PORT}.`);
  }

  return parsed;
}

function parseHost(raw: string): string {
  const host = raw.trim();

  if (!host) {
    throw new CliArgsError("Host value cannot be empty.");
  }

  return host;
}

function requireValue(flag: string, next: string | undefined): string {
  if (!next || next.startsWith("-")) {
    throw new CliArgsError(`Missing value for ${flag}.`);
  }

  return next;
}

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliParseResult {
  let port = env.PORT === undefined ? DEFAULT_PORT : parsePort(env.PORT);
  let host = env.HOST === undefined ? DEFAULT_HOST : parseHost(env.HOST);

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === undefined) {
      break;
    }

    if (token === "-h" || token === "--help") {
      return {
        kind: "help",
        message: formatHelp(),
      };
    }

    if (token === "-p" || token === "--port") {
      port = parsePort(requireValue(token, argv[index + 1]));
      index += 1;
      continue;
    }

    if (token.startsWith("--port=")) {
      port = parsePort(token.slice("--port=".length));
      continue;
    }

    if (token === "--host") {
      host = parseHost(requireValue(token, argv[index + 1]));
      index += 1;
      continue;
    }

    if (token.startsWith("--host=")) {
      host = parseHost(token.slice("--host=".length));
      continue;
    }

    throw new CliArgsError(token.startsWith("-") ? `Unknown flag: ${token}` : `Unexpected argument: ${token}`);
  }

  return {
    kind: "run",
    options: {
      port,
      host,
    },
  };
}
