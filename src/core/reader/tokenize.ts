// src/core/reader/tokenize.ts

import type { Outcome } from "../../outcome";
import { done, syntaxError } from "../../outcome";

export type Tok =
  | { tag: "LParen"; at: number }
  | { tag: "RParen"; at: number }
  | { tag: "Quote"; at: number }
  | { tag: "Str"; s: string; at: number }
  | { tag: "Atom"; s: string; at: number };

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\"": "\"", "\\": "\\" };

export function tokenize(src: string): Outcome<Tok[]> {
  const toks: Tok[] = [];
  let i = 0;

  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";

  while (i < src.length) {
    const c = src[i];

    // comments
    if (c === ";") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    if (isWS(c)) { i++; continue; }

    if (c === "(") { toks.push({ tag: "LParen", at: i }); i++; continue; }
    if (c === ")") { toks.push({ tag: "RParen", at: i }); i++; continue; }
    if (c === "'") { toks.push({ tag: "Quote", at: i }); i++; continue; }

    if (c === "\"") {
      const start = i;
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i];
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          const e = src[i + 1] ?? "";
          s += ESCAPES[e] ?? e;
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) return syntaxError("unterminated string literal", start);
      toks.push({ tag: "Str", s, at: start });
      continue;
    }

    // atom: read until whitespace or delimiter
    const start = i;
    let a = "";
    while (i < src.length) {
      const d = src[i];
      if (isWS(d) || d === "(" || d === ")" || d === "'" || d === ";" || d === "\"") break;
      a += d;
      i++;
    }
    toks.push({ tag: "Atom", s: a, at: start });
  }

  return done(toks);
}
