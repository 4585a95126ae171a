import type { LoweredProgram } from "./semantics/nodes.js";

/** Whatever consumes a resolved program: a type checker, a code generator or an interpreter. */
export interface Backend<R> {
  run(program: LoweredProgram): R;
}
