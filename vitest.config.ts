import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    pool: "forks",
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      // cli.ts and the foreground part of daemon.ts own process signals and
      // exit codes; they are exercised by hand, not by unit tests.
      include: [
        "src/framer.ts",
        "src/bus.ts",
        "src/irc-client.ts",
        "src/registry.ts",
        "src/session.ts",
        "src/protocol.ts",
        "src/config.ts",
        "src/server.ts",
        "src/client.ts",
      ],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
    },
  },
});
