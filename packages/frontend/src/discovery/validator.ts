/**
 * Validator and deduplicator
 *
 * Malformed instantiations (wrong argument count) are diagnosed and
 * dropped. Duplicate signatures are diagnosed but still accepted: which
 * registration wins is the container's decision.
 */

import type {
  ContractInstantiation,
  TypeDescriptor,
  TypeIdentity,
  TypeReference,
} from "../catalog/types.js";
import {
  displayTypeReference,
  formatSignature,
  formatTypeReference,
} from "../catalog/type-reference.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import type { HandlerRecord } from "./types.js";

export const CONTRACT_ARITY = 2;

export type AcceptResult = {
  readonly record?: HandlerRecord;
  readonly diagnostic?: Diagnostic;
};

export type HandlerValidator = {
  readonly accept: (
    type: TypeDescriptor,
    instantiation: ContractInstantiation
  ) => AcceptResult;
};

/**
 * Create a validator for one run. It remembers every signature accepted so
 * far, so a run must use a single validator.
 */
export const createHandlerValidator = (
  contract: TypeIdentity
): HandlerValidator => {
  const seenSignatures = new Set<string>();

  const accept = (
    type: TypeDescriptor,
    instantiation: ContractInstantiation
  ): AcceptResult => {
    const location = instantiation.location ?? type.locations[0];
    const [inputType, outputType] = instantiation.typeArguments;

    if (
      instantiation.typeArguments.length !== CONTRACT_ARITY ||
      !inputType ||
      !outputType
    ) {
      return {
        diagnostic: createDiagnostic(
          "arity-mismatch",
          "warning",
          `Handler '${type.name}' implements ${contract.name} with ${instantiation.typeArguments.length} type arguments instead of ${CONTRACT_ARITY}`,
          location
        ),
      };
    }

    const handlerRef: TypeReference = {
      kind: "named",
      module: type.module,
      name: type.name,
      typeArguments: type.typeArguments,
    };
    const signature = formatSignature(inputType, outputType);
    const record: HandlerRecord = {
      handler: type,
      handlerName: formatTypeReference(handlerRef),
      inputType,
      outputType,
      signature,
    };

    if (!seenSignatures.has(signature)) {
      seenSignatures.add(signature);
      return { record };
    }

    return {
      record,
      diagnostic: createDiagnostic(
        "duplicate-handler",
        "warning",
        `Multiple handlers found for request type '${displayTypeReference(inputType)}' returning '${displayTypeReference(outputType)}'. Handler: '${displayTypeReference(handlerRef)}'`,
        location
      ),
    };
  };

  return { accept };
};
