/**
 * Tests for the registration emitter
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type {
  HandlerRecord,
  TypeDescriptor,
  TypeReference,
} from "@relaygen/frontend";
import { emitRegistrationUnit } from "./registration-emitter.js";
import { stripInformationalLines } from "./constants.js";

const named = (
  name: string,
  module = "./src/requests.ts",
  typeArguments: readonly TypeReference[] = []
): TypeReference => ({ kind: "named", module, name, typeArguments });

const handler = (
  name: string,
  module = "./src/handlers.ts",
  typeArguments: readonly TypeReference[] = []
): TypeDescriptor => ({
  module,
  name,
  accessibility: "public",
  isAbstract: false,
  isStatic: false,
  arity: typeArguments.length,
  isUnboundGeneric: false,
  typeArguments,
  baseList: [{ text: "RequestHandler" }],
  interfaces: [],
  constructors: [{ accessibility: "public", isStatic: false }],
  locations: [],
});

const record = (
  type: TypeDescriptor,
  inputType: TypeReference,
  outputType: TypeReference
): HandlerRecord => ({
  handler: type,
  handlerName: `${type.module}#${type.name}`,
  inputType,
  outputType,
  signature: "",
});

const options = { generatorVersion: "1.0.0" };

describe("Registration Emitter", () => {
  it("should emit nothing for an empty record set", () => {
    expect(emitRegistrationUnit([], options)).to.equal(undefined);
  });

  it("should emit a complete registration module", () => {
    const unit = emitRegistrationUnit(
      [record(handler("PingHandler"), named("Ping"), named("Pong"))],
      options
    );

    expect(unit?.name).to.equal("service-registration-extensions");
    expect(unit?.fileName).to.equal(
      "src/generated/service-registration-extensions.ts"
    );
    expect(unit?.handlerCount).to.equal(1);
    expect(unit?.text).to.equal(
      [
        "// <auto-generated/>",
        "// Generated by relaygen v1.0.0",
        "// Handlers discovered: 1",
        "// WARNING: Do not modify this file manually",
        "",
        'import { serviceKey, type ServiceCollection } from "@relaygen/contracts";',
        'import * as __m0 from "../handlers.js";',
        'import type * as __m1 from "../requests.js";',
        'import type * as __m2 from "@relaygen/contracts";',
        "",
        "/**",
        " * Registers 1 discovered request handler as scoped service.",
        " *",
        " * @param services - Collection the handlers are added to",
        " * @returns The same collection",
        " */",
        "export const registerHandlers = <TServices extends ServiceCollection>(",
        "  services: TServices",
        "): TServices => {",
        '  services.registerScoped(serviceKey<__m2.RequestHandler<__m1.Ping, __m1.Pong>>("@relaygen/contracts#RequestHandler<./src/requests.ts#Ping, ./src/requests.ts#Pong>"), __m0.PingHandler);',
        "  return services;",
        "};",
        "",
      ].join("\n")
    );
  });

  it("should register records in the given order", () => {
    const unit = emitRegistrationUnit(
      [
        record(handler("B"), named("Ping"), { kind: "primitive", name: "string" }),
        record(handler("A"), named("Pong"), { kind: "primitive", name: "number" }),
      ],
      options
    );

    const registrations = (unit?.text ?? "")
      .split("\n")
      .filter((line) => line.startsWith("  services.registerScoped"));
    expect(registrations).to.deep.equal([
      '  services.registerScoped(serviceKey<__m2.RequestHandler<__m1.Ping, string>>("@relaygen/contracts#RequestHandler<./src/requests.ts#Ping, string>"), __m0.B);',
      '  services.registerScoped(serviceKey<__m2.RequestHandler<__m1.Pong, number>>("@relaygen/contracts#RequestHandler<./src/requests.ts#Pong, number>"), __m0.A);',
    ]);
  });

  it("should import a module once for both values and types", () => {
    const unit = emitRegistrationUnit(
      [record(handler("PingHandler", "./src/ping.ts"), named("Ping", "./src/ping.ts"), named("Date", ""))],
      options
    );

    const imports = (unit?.text ?? "")
      .split("\n")
      .filter((line) => line.startsWith("import"));
    expect(imports).to.deep.equal([
      'import { serviceKey, type ServiceCollection } from "@relaygen/contracts";',
      'import * as __m0 from "../ping.js";',
      'import type * as __m1 from "@relaygen/contracts";',
    ]);
    expect(unit?.text).to.contain(
      "serviceKey<__m1.RequestHandler<__m0.Ping, Date>>"
    );
  });

  it("should emit nested generic and structural arguments", () => {
    const input = named("Envelope", "./src/envelope.ts", [
      named("Ping"),
      {
        kind: "array",
        readonly: true,
        elementType: {
          kind: "union",
          types: [
            { kind: "literal", value: "a" },
            { kind: "primitive", name: "null" },
          ],
        },
      },
    ]);
    const output: TypeReference = {
      kind: "tuple",
      elements: [
        named("Result", "lib-results"),
        { kind: "primitive", name: "boolean" },
      ],
    };

    const unit = emitRegistrationUnit(
      [record(handler("EnvelopeHandler"), input, output)],
      options
    );

    expect(unit?.text).to.contain(
      '  services.registerScoped(serviceKey<__m3.RequestHandler<__m0.Envelope<__m2.Ping, readonly ("a" | null)[]>, [__m4.Result, boolean]>>("@relaygen/contracts#RequestHandler<./src/envelope.ts#Envelope<./src/requests.ts#Ping, readonly (\\"a\\" | null)[]>, [lib-results#Result, boolean]>"), __m1.EnvelopeHandler);'
    );
  });

  it("should qualify and import names used inside opaque types", () => {
    const input: TypeReference = {
      kind: "opaque",
      parts: ["{ ping: ", named("Ping"), " }"],
    };
    const output: TypeReference = {
      kind: "opaque",
      parts: [named("Ping"), '["text"]'],
    };

    const unit = emitRegistrationUnit(
      [record(handler("C"), input, output)],
      options
    );
    const lines = (unit?.text ?? "").split("\n");

    expect(lines.filter((line) => line.startsWith("import"))).to.deep.equal([
      'import { serviceKey, type ServiceCollection } from "@relaygen/contracts";',
      'import * as __m0 from "../handlers.js";',
      'import type * as __m1 from "../requests.js";',
      'import type * as __m2 from "@relaygen/contracts";',
    ]);
    expect(
      lines.filter((line) => line.startsWith("  services.registerScoped"))
    ).to.deep.equal([
      '  services.registerScoped(serviceKey<__m2.RequestHandler<{ ping: __m1.Ping }, __m1.Ping["text"]>>("@relaygen/contracts#RequestHandler<{ ping: ./src/requests.ts#Ping }, ./src/requests.ts#Ping[\\"text\\"]>"), __m0.C);',
    ]);
  });

  it("should register closed generic handlers as instantiation expressions", () => {
    const unit = emitRegistrationUnit(
      [
        record(
          handler("Box", "./src/handlers.ts", [named("A", "./src/models.ts")]),
          named("Ping"),
          { kind: "primitive", name: "string" }
        ),
        record(
          handler("Box", "./src/handlers.ts", [named("B", "./src/models.ts")]),
          named("Pong"),
          { kind: "primitive", name: "string" }
        ),
      ],
      options
    );
    const lines = (unit?.text ?? "").split("\n");

    expect(lines).to.include('import type * as __m1 from "../models.js";');
    expect(
      lines.filter((line) => line.startsWith("  services.registerScoped"))
    ).to.deep.equal([
      '  services.registerScoped(serviceKey<__m3.RequestHandler<__m2.Ping, string>>("@relaygen/contracts#RequestHandler<./src/requests.ts#Ping, string>"), __m0.Box<__m1.A>);',
      '  services.registerScoped(serviceKey<__m3.RequestHandler<__m2.Pong, string>>("@relaygen/contracts#RequestHandler<./src/requests.ts#Pong, string>"), __m0.Box<__m1.B>);',
    ]);
  });

  it("should count the handlers in the entry point's doc comment", () => {
    const unit = emitRegistrationUnit(
      [
        record(handler("A"), named("Ping"), named("Pong")),
        record(handler("B"), named("Pong"), named("Ping")),
      ],
      options
    );

    expect((unit?.text ?? "").split("\n")).to.include(
      " * Registers 2 discovered request handlers as scoped services."
    );
  });

  it("should honor the output file and import extension", () => {
    const unit = emitRegistrationUnit(
      [record(handler("PingHandler"), named("Ping"), named("Pong"))],
      { ...options, outputFile: "src/registrations.ts", importExtension: "" }
    );

    expect(unit?.fileName).to.equal("src/registrations.ts");
    expect(unit?.text).to.contain('import * as __m0 from "./handlers";');
  });

  it("should use the configured runtime module and contract", () => {
    const unit = emitRegistrationUnit(
      [record(handler("PingHandler"), named("Ping"), named("Pong"))],
      {
        ...options,
        runtimeModule: "./src/container.ts",
        contract: { module: "./src/contracts.ts", name: "Handles" },
      }
    );

    expect(unit?.text).to.contain(
      'import { serviceKey, type ServiceCollection } from "../container.js";'
    );
    expect(unit?.text).to.contain(
      '"./src/contracts.ts#Handles<./src/requests.ts#Ping, ./src/requests.ts#Pong>"'
    );
  });

  describe("Timestamp", () => {
    const records = [record(handler("PingHandler"), named("Ping"), named("Pong"))];

    it("should add an informational line only when asked", () => {
      const unit = emitRegistrationUnit(records, {
        ...options,
        includeTimestamp: true,
        timestamp: "2024-01-01T00:00:00.000Z",
      });

      expect(unit?.text.split("\n")[2]).to.equal(
        "// Generated at: 2024-01-01T00:00:00.000Z (informational)"
      );
    });

    it("should compare equal to untimed output once stripped", () => {
      const timed = emitRegistrationUnit(records, {
        ...options,
        includeTimestamp: true,
        timestamp: "2024-01-01T00:00:00.000Z",
      });
      const untimed = emitRegistrationUnit(records, options);

      expect(stripInformationalLines(timed?.text ?? "")).to.equal(
        untimed?.text
      );
    });
  });

  it("should be deterministic", () => {
    const records = [
      record(handler("PingHandler"), named("Ping"), named("Pong")),
      record(handler("Other", "./src/other.ts"), named("Pong"), named("Ping")),
    ];

    expect(emitRegistrationUnit(records, options)?.text).to.equal(
      emitRegistrationUnit(records, options)?.text
    );
  });
});
