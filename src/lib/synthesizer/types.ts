/**
 * Union synthesizer types
 */

import type { TypeNode } from "../../types/type-node.js";

/**
 * Branch decoded from one union candidate, with the field that encoded it
 * when the candidate was a single-field record
 */
export interface DecodedBranch {
  branch: TypeNode;
  encodedBy?: string;
}
