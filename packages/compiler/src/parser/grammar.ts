import type { Punctuator } from "./tokens.js";

type OperatorTable = Readonly<Partial<Record<Punctuator, string>>>;

export const PREFIX_OPERATORS: OperatorTable = {
  "+": "plus",
  "-": "minus",
  "/": "reciprocal",
  "!": "logical_not",
  "~": "bitwise_not",
};

/** Binary tiers, loosest first. Each tier is left associative. */
export const BINARY_TIERS: readonly OperatorTable[] = [
  { "==": "equal", "!=": "not_equal" },
  {
    ">": "greater",
    ">=": "greater_or_equal",
    "<": "less",
    "<=": "less_or_equal",
  },
  { "|": "bitwise_or" },
  { "^": "bitwise_xor" },
  { "&": "bitwise_and" },
  { ">>": "right_shift", "<<": "left_shift" },
  { "+": "add", "-": "sub" },
  { "*": "mul", "/": "div", "%": "rem" },
];

export const ASSIGNMENT_OPERATORS: OperatorTable = {
  "=": "assign",
  "+=": "add_assign",
  "-=": "sub_assign",
  "*=": "mul_assign",
  "/=": "div_assign",
  "%=": "rem_assign",
  ">>=": "right_shift_assign",
  "<<=": "left_shift_assign",
  "&=": "bitwise_and_assign",
  "^=": "bitwise_xor_assign",
  "|=": "bitwise_or_assign",
};
