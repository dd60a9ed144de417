// src/core/reader/parse.ts
// Source text to AST. Syntax errors carry the offending offset.

import type { Outcome } from "../../outcome";
import { done, isFail, syntaxError } from "../../outcome";
import { tokenize, type Tok } from "./tokenize";
import { lit, list, sym, type Node } from "./ast";

const NUMBER = /^-?\d+(\.\d+)?$/;

class SyntaxFault {
  constructor(readonly message: string, readonly at: number) {}
}

function atom(s: string, at: number): Node {
  if (s === "#t" || s === "true") return lit(true, at);
  if (s === "#f" || s === "false") return lit(false, at);
  if (s === "nil" || s === "null") return lit(null, at);
  if (NUMBER.test(s)) return lit(Number(s), at);
  return sym(s, at);
}

export function parseTokens(toks: Tok[], srcLength: number): Outcome<Node[]> {
  const out: Node[] = [];
  let i = 0;

  function parseOne(): Node {
    const t = toks[i];
    if (!t) throw new SyntaxFault("unexpected end of input", srcLength);

    switch (t.tag) {
      case "Quote": {
        i++;
        const d = parseOne();
        return list([sym("quote", t.at), d], t.at);
      }
      case "LParen": {
        i++;
        const items: Node[] = [];
        for (;;) {
          const u = toks[i];
          if (!u) throw new SyntaxFault("missing ')'", t.at);
          if (u.tag === "RParen") { i++; break; }
          items.push(parseOne());
        }
        return list(items, t.at);
      }
      case "RParen":
        throw new SyntaxFault("unexpected ')'", t.at);
      case "Str":
        i++;
        return lit(t.s, t.at);
      case "Atom":
        i++;
        return atom(t.s, t.at);
    }
  }

  try {
    while (i < toks.length) {
      out.push(parseOne());
    }
  } catch (e) {
    if (e instanceof SyntaxFault) return syntaxError(e.message, e.at);
    throw e;
  }
  return done(out);
}

export function parse(src: string): Outcome<Node[]> {
  const toks = tokenize(src);
  if (isFail(toks)) return toks;
  return parseTokens(toks.value, src.length);
}
