/**
 * Tests for type reference printing
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  collectNamedReferences,
  displayTypeReference,
  formatIdentity,
  formatSignature,
  formatTypeReference,
  sameIdentity,
} from "./type-reference.js";
import type { TypeReference } from "./types.js";

const ping: TypeReference = {
  kind: "named",
  module: "./src/requests.ts",
  name: "Ping",
  typeArguments: [],
};

const envelope: TypeReference = {
  kind: "named",
  module: "./src/envelope.ts",
  name: "Messaging.Envelope",
  typeArguments: [ping, { kind: "primitive", name: "string" }],
};

describe("Type references", () => {
  describe("formatIdentity", () => {
    it("should join module and name", () => {
      expect(formatIdentity({ module: "@acme/x", name: "Y" })).to.equal(
        "@acme/x#Y"
      );
    });

    it("should print globals without a module", () => {
      expect(formatIdentity({ module: "", name: "Date" })).to.equal("Date");
    });
  });

  describe("formatTypeReference", () => {
    it("should qualify generic arguments", () => {
      expect(formatTypeReference(envelope)).to.equal(
        "./src/envelope.ts#Messaging.Envelope<./src/requests.ts#Ping, string>"
      );
    });

    it("should parenthesize union array elements", () => {
      const ref: TypeReference = {
        kind: "array",
        readonly: true,
        elementType: {
          kind: "union",
          types: [
            { kind: "literal", value: "a" },
            { kind: "literal", value: 2 },
          ],
        },
      };
      expect(formatTypeReference(ref)).to.equal('readonly ("a" | 2)[]');
    });

    it("should print tuples, intersections and opaque text", () => {
      const ref: TypeReference = {
        kind: "tuple",
        elements: [
          {
            kind: "intersection",
            types: [ping, { kind: "opaque", parts: ["{ id: string }"] }],
          },
          { kind: "literal", value: true },
        ],
      };
      expect(formatTypeReference(ref)).to.equal(
        "[./src/requests.ts#Ping & ({ id: string }), true]"
      );
    });

    it("should qualify names inside opaque text", () => {
      const ref: TypeReference = {
        kind: "opaque",
        parts: ["{ ping: ", ping, '; tag: "a" }'],
      };
      expect(formatTypeReference(ref)).to.equal(
        '{ ping: ./src/requests.ts#Ping; tag: "a" }'
      );
    });

    it("should parenthesize function types inside arrays and unions", () => {
      const fn: TypeReference = { kind: "opaque", parts: ["() => void"] };
      expect(
        formatTypeReference({ kind: "array", readonly: false, elementType: fn })
      ).to.equal("(() => void)[]");
      expect(
        formatTypeReference({
          kind: "union",
          types: [fn, { kind: "primitive", name: "string" }],
        })
      ).to.equal("(() => void) | string");
    });

    it("should leave bare opaque names ungrouped", () => {
      const ref: TypeReference = {
        kind: "array",
        readonly: false,
        elementType: { kind: "opaque", parts: ["Legacy.Shape"] },
      };
      expect(formatTypeReference(ref)).to.equal("Legacy.Shape[]");
    });

    it("should parenthesize readonly arrays nested in arrays", () => {
      const inner: TypeReference = {
        kind: "array",
        readonly: true,
        elementType: { kind: "primitive", name: "string" },
      };
      expect(
        formatTypeReference({ kind: "array", readonly: false, elementType: inner })
      ).to.equal("(readonly string[])[]");
      expect(
        formatTypeReference({ kind: "array", readonly: true, elementType: inner })
      ).to.equal("readonly (readonly string[])[]");
    });

    it("should not group a mutable array nested in an array", () => {
      const inner: TypeReference = {
        kind: "array",
        readonly: false,
        elementType: { kind: "primitive", name: "number" },
      };
      expect(
        formatTypeReference({ kind: "array", readonly: true, elementType: inner })
      ).to.equal("readonly number[][]");
    });
  });

  describe("displayTypeReference", () => {
    it("should drop module identities", () => {
      expect(displayTypeReference(envelope)).to.equal(
        "Messaging.Envelope<Ping, string>"
      );
    });
  });

  describe("formatSignature", () => {
    it("should join input and output with a bar", () => {
      expect(
        formatSignature(ping, { kind: "primitive", name: "number" })
      ).to.equal("./src/requests.ts#Ping|number");
    });
  });

  describe("collectNamedReferences", () => {
    it("should list nested references outermost first", () => {
      expect(collectNamedReferences(envelope)).to.deep.equal([
        { module: "./src/envelope.ts", name: "Messaging.Envelope" },
        { module: "./src/requests.ts", name: "Ping" },
      ]);
    });
  });

  describe("collectNamedReferences in opaque text", () => {
    it("should list the references embedded in the text", () => {
      expect(
        collectNamedReferences({
          kind: "opaque",
          parts: ["(input: ", envelope, ") => void"],
        })
      ).to.deep.equal([
        { module: "./src/envelope.ts", name: "Messaging.Envelope" },
        { module: "./src/requests.ts", name: "Ping" },
      ]);
    });
  });

  describe("sameIdentity", () => {
    it("should compare module and name", () => {
      expect(sameIdentity({ module: "a", name: "B" }, { module: "a", name: "B" }))
        .to.be.true;
      expect(sameIdentity({ module: "a", name: "B" }, { module: "", name: "B" }))
        .to.be.false;
    });
  });
});
