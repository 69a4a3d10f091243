/**
 * Test harness for program-backed catalogs.
 * Writes a small project (with an installed contracts package) into a
 * temporary directory.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

const CONTRACTS_PACKAGE_JSON = JSON.stringify(
  {
    name: "@relaygen/contracts",
    version: "0.0.0",
    type: "module",
    types: "index.d.ts",
  },
  null,
  2
);

const CONTRACTS_DTS = `export interface RequestHandler<TInput, TOutput> {
  handle(input: TInput): Promise<TOutput>;
}
export interface ServiceCollection {
  registerScoped(key: unknown, implementation: unknown): this;
}
`;

export type TestProject = {
  readonly root: string;
  readonly write: (relativePath: string, content: string) => string;
  readonly cleanup: () => void;
};

/**
 * Create a project root holding `files` (paths relative to the root) plus
 * node_modules/@relaygen/contracts
 */
export const createTestProject = (
  files: Readonly<Record<string, string>>
): TestProject => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "relaygen-test-"));

  const write = (relativePath: string, content: string): string => {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    return fullPath;
  };

  write(
    "package.json",
    JSON.stringify({ name: "app", version: "1.0.0", type: "module" }, null, 2)
  );
  write("node_modules/@relaygen/contracts/package.json", CONTRACTS_PACKAGE_JSON);
  write("node_modules/@relaygen/contracts/index.d.ts", CONTRACTS_DTS);

  for (const [relativePath, content] of Object.entries(files)) {
    write(relativePath, content);
  }

  return {
    root,
    write,
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
};

/**
 * Request types most fixtures import
 */
export const REQUESTS_SOURCE = `export class Ping {
  constructor(readonly text: string) {}
}
export interface Pong {
  readonly reply: string;
}
`;
