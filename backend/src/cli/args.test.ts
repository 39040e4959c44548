import { describe, expect, it } from "vitest";
import { CliArgsError, parseCliArgs } from "./args.js";

describe("parseCliArgs", () => {
  it("returns defaults when no args or env are provided", () => {
    expect(parseCliArgs([], {})).toEqual({
      kind: "run",
      options: {
        port: 8000,
        host: "127.0.0.1",
      },
    });
  });

  it("reads PORT and HOST from the environment", () => {
    expect(parseCliArgs([], { PORT: "9100", HOST: "0.0.0.0" })).toEqual({
      kind: "run",
      options: {
        port: 9100,
        host: "0.0.0.0",
      },
    });
  });

  it("lets flags override the environment", () => {
    const parsed = parseCliArgs(["--port", "4000", "--host=localhost"], { PORT: "9100" });

    expect(parsed).toEqual({
      kind: "run",
      options: {
        port: 4000,
        host: "localhost",
      },
    });
  });

  it("accepts the short port flag and the inline form", () => {
    expect(parseCliArgs(["-p", "4001"], {})).toMatchObject({ options: { port: 4001 } });
    expect(parseCliArgs(["--port=4002"], {})).toMatchObject({ options: { port: 4002 } });
  });

  it("returns help payload", () => {
    const parsed = parseCliArgs(["--port", "4000", "--help"], {});

    expect(parsed.kind).toBe("help");
    if (parsed.kind === "help") {
      expect(parsed.message).toContain("Usage:");
      expect(parsed.message).toContain("hello-api [--port <number>] [--host <host>]");
    }
  });

  it("throws on unknown flags and stray arguments", () => {
    expect(() => parseCliArgs(["--wat"], {})).toThrow("Unknown flag: --wat");
    expect(() => parseCliArgs(["serve"], {})).toThrow("Unexpected argument: serve");
  });

  it("throws on invalid ports from flags or env", () => {
    expect(() => parseCliArgs(["--port", "abc"], {})).toThrow(CliArgsError);
    expect(() => parseCliArgs(["--port=70000"], {})).toThrow(
      "Invalid port: 70000. Use an integer between 1-65535.",
    );
    expect(() => parseCliArgs([], { PORT: "" })).toThrow(CliArgsError);
  });

  it("throws when a flag value is missing", () => {
    expect(() => parseCliArgs(["--port"], {})).toThrow("Missing value for --port.");
    expect(() => parseCliArgs(["--host", "--port", "4000"], {})).toThrow("Missing value for --host.");
  });

  it("rejects empty hosts", () => {
    expect(() => parseCliArgs(["--host="], {})).toThrow("Host value cannot be empty.");
  });
});
