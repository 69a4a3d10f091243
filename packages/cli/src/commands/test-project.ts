/**
 * Temporary projects for command tests
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { resolveConfig } from "../config.js";
import type { CliOptions, RelaygenConfig, ResolvedConfig } from "../types.js";

export const REQUESTS_SOURCE = `export class Ping {
  constructor(readonly text: string) {}
}
export class Pong {
  constructor(readonly reply: string) {}
}
`;

export const HANDLERS_SOURCE = `import type { RequestHandler } from "@relaygen/contracts";
import { Ping, Pong } from "./requests.js";

export class PingHandler implements RequestHandler<Ping, Pong> {
  async handle(input: Ping): Promise<Pong> {
    return new Pong(input.text);
  }
}

export class PongHandler implements RequestHandler<Pong, Ping> {
  async handle(input: Pong): Promise<Ping> {
    return new Ping(input.reply);
  }
}
`;

export type CommandProject = {
  readonly root: string;
  readonly write: (relativePath: string, content: string) => void;
  readonly read: (relativePath: string) => string | undefined;
  readonly config: (
    config?: RelaygenConfig,
    options?: CliOptions
  ) => ResolvedConfig;
  readonly cleanup: () => void;
};

/**
 * A project with an installed contracts package and two handlers
 */
export const createCommandProject = (): CommandProject => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "relaygen-cli-"));

  const write = (relativePath: string, content: string): void => {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  };

  const read = (relativePath: string): string | undefined => {
    const fullPath = path.join(root, relativePath);
    return fs.existsSync(fullPath) ? fs.readFileSync(fullPath, "utf-8") : undefined;
  };

  write(
    "package.json",
    JSON.stringify({ name: "app", version: "1.0.0", type: "module" }, null, 2)
  );
  write(
    "node_modules/@relaygen/contracts/package.json",
    JSON.stringify(
      { name: "@relaygen/contracts", version: "0.0.0", type: "module", types: "index.d.ts" },
      null,
      2
    )
  );
  write(
    "node_modules/@relaygen/contracts/index.d.ts",
    "export interface RequestHandler<TInput, TOutput> {\n  handle(input: TInput): Promise<TOutput>;\n}\n"
  );
  write("src/requests.ts", REQUESTS_SOURCE);
  write("src/handlers.ts", HANDLERS_SOURCE);

  return {
    root,
    write,
    read,
    config: (config = {}, options = { quiet: true }) =>
      resolveConfig(config, options, root),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
};
