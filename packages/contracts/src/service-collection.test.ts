/**
 * Tests for service keys and the registration sink contract
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { RequestHandler } from "./request.js";
import {
  requestHandlerKey,
  serviceKey,
  type ServiceCollection,
  type ServiceConstructor,
  type ServiceKey,
} from "./service-collection.js";

type Registration = {
  readonly key: string;
  readonly implementation: ServiceConstructor<unknown>;
};

class RecordingCollection implements ServiceCollection {
  readonly registrations: Registration[] = [];

  registerScoped<TService>(
    key: ServiceKey<TService>,
    implementation: ServiceConstructor<TService>
  ): this {
    this.registrations.push({ key: key.name, implementation });
    return this;
  }
}

class Ping {
  readonly message = "ping";
}

class PingHandler implements RequestHandler<Ping, string> {
  constructor(private readonly prefix: string) {}

  async handle(input: Ping): Promise<string> {
    return `${this.prefix}${input.message}`;
  }
}

describe("Service keys", () => {
  describe("serviceKey", () => {
    it("should keep the given name", () => {
      expect(serviceKey<number>("answer").name).to.equal("answer");
    });
  });

  describe("requestHandlerKey", () => {
    it("should name the handler contract with both type names", () => {
      const key = requestHandlerKey<Ping, string>(
        "./src/requests.ts#Ping",
        "string"
      );

      expect(key.name).to.equal(
        "@relaygen/contracts#RequestHandler<./src/requests.ts#Ping, string>"
      );
    });
  });

  describe("ServiceCollection", () => {
    it("should allow chained scoped registrations", () => {
      const services = new RecordingCollection();

      const returned = services
        .registerScoped(
          requestHandlerKey<Ping, string>("./ping.ts#Ping", "string"),
          PingHandler
        )
        .registerScoped(serviceKey<Ping>("ping"), Ping);

      expect(returned).to.equal(services);
      expect(services.registrations.map((r) => r.key)).to.deep.equal([
        "@relaygen/contracts#RequestHandler<./ping.ts#Ping, string>",
        "ping",
      ]);
      expect(services.registrations[0]?.implementation).to.equal(PingHandler);
    });
  });
});
