/**
 * Registration emitter - one module registering every accepted handler
 */

import {
  type HandlerRecord,
  formatTypeReference,
} from "@relaygen/frontend";
import { UNIT_NAME, generateFileHeader } from "./constants.js";
import {
  type ModuleAliasMap,
  buildModuleAliases,
  resolveImportSpecifier,
} from "./module-aliases.js";
import { emitTypeReference } from "./type-emitter.js";
import { defaultOptions } from "./options.js";
import type { EmitterOptions, GeneratedUnit } from "./types.js";

const emitImports = (
  aliases: ModuleAliasMap,
  options: EmitterOptions
): string => {
  const runtimeSpecifier = resolveImportSpecifier(
    options.outputFile,
    options.runtimeModule,
    options.importExtension
  );
  const lines = [
    `import { serviceKey, type ServiceCollection } from ${JSON.stringify(runtimeSpecifier)};`,
    ...aliases.imports.map(
      (entry) =>
        `import ${entry.valueImport ? "" : "type "}* as ${entry.alias} from ${JSON.stringify(entry.specifier)};`
    ),
  ];
  return lines.join("\n");
};

const emitRegistration = (
  record: HandlerRecord,
  aliases: ModuleAliasMap,
  options: EmitterOptions
): string => {
  const contractArguments = [record.inputType, record.outputType];
  const contractType = emitTypeReference(
    { kind: "named", ...options.contract, typeArguments: contractArguments },
    aliases.aliasOf
  );
  const key = formatTypeReference({
    kind: "named",
    ...options.contract,
    typeArguments: contractArguments,
  });
  // A closed generic handler is registered as an instantiation expression
  const implementation = emitTypeReference(
    {
      kind: "named",
      module: record.handler.module,
      name: record.handler.name,
      typeArguments: record.handler.typeArguments,
    },
    aliases.aliasOf
  );

  return `  services.registerScoped(serviceKey<${contractType}>(${JSON.stringify(key)}), ${implementation});`;
};

const emitEntryPointDoc = (handlerCount: number): readonly string[] => {
  const plural = handlerCount === 1 ? "" : "s";
  return [
    "/**",
    ` * Registers ${handlerCount} discovered request handler${plural} as scoped service${plural}.`,
    " *",
    " * @param services - Collection the handlers are added to",
    " * @returns The same collection",
    " */",
  ];
};

/**
 * Emit the registration module for records already in emission order.
 * Nothing is emitted for an empty record set.
 */
export const emitRegistrationUnit = (
  records: readonly HandlerRecord[],
  options: Partial<EmitterOptions> = {}
): GeneratedUnit | undefined => {
  if (records.length === 0) {
    return undefined;
  }

  const finalOptions: EmitterOptions = { ...defaultOptions, ...options };
  const aliases = buildModuleAliases(records, finalOptions);

  const parts: string[] = [];
  parts.push(
    generateFileHeader(records.length, {
      version: finalOptions.generatorVersion,
      includeTimestamp: finalOptions.includeTimestamp,
      timestamp: finalOptions.timestamp,
    })
  );
  parts.push(emitImports(aliases, finalOptions));
  parts.push("");
  parts.push(...emitEntryPointDoc(records.length));
  parts.push(
    "export const registerHandlers = <TServices extends ServiceCollection>("
  );
  parts.push("  services: TServices");
  parts.push("): TServices => {");
  for (const record of records) {
    parts.push(emitRegistration(record, aliases, finalOptions));
  }
  parts.push("  return services;");
  parts.push("};");
  parts.push("");

  return {
    name: UNIT_NAME,
    fileName: finalOptions.outputFile,
    text: parts.join("\n"),
    handlerCount: records.length,
  };
};
