/**
 * Interface matcher
 */

import type {
  ContractInstantiation,
  TypeDescriptor,
  TypeIdentity,
} from "../catalog/types.js";
import { sameIdentity } from "../catalog/type-reference.js";

/**
 * Every implemented instantiation of the target contract, in the order the
 * type lists its interfaces
 */
export const matchContract = (
  type: TypeDescriptor,
  contract: TypeIdentity
): readonly ContractInstantiation[] =>
  type.interfaces.filter((iface) => sameIdentity(iface.origin, contract));
