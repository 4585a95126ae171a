import { bench } from "vitest";
import { CharStream } from "../char-stream.js";
import { readToken } from "../lexer.js";
import { parseSource } from "../parser.js";

const BENCH_FILE = Array.from(
  { length: 500 },
  (_, index) => `func step${index}(a: int, b: int) -> int
  var total = a * ${index} + b
  while total < 1_000 && a != b
    total += "step".len -- counted
  end
  total
end
`
).join("\n");

bench("tokenizer performance", () => {
  const chars = new CharStream(BENCH_FILE, "bench.brk");
  for (;;) {
    const { info } = readToken(chars, true, false, () => undefined);
    if (!info) return;
  }
});

bench("full parser performance", () => {
  parseSource(BENCH_FILE, "bench.brk");
});
