// src/core/reader/ast.ts

export type Lit = { tag: "Lit"; value: number | string | boolean | null; offset?: number };
export type Sym = { tag: "Sym"; name: string; offset?: number };
export type List = { tag: "List"; items: Node[]; offset?: number };

export type Node = Lit | Sym | List;

export const lit = (value: Lit["value"], offset?: number): Lit => ({ tag: "Lit", value, offset });
export const sym = (name: string, offset?: number): Sym => ({ tag: "Sym", name, offset });
export const list = (items: Node[], offset?: number): List => ({ tag: "List", items, offset });

export const isSym = (n: Node, name?: string): n is Sym =>
  n.tag === "Sym" && (name === undefined || n.name === name);

/** `:name` marks a named argument in an application. */
export const isKeyword = (n: Node): n is Sym & { name: `:${string}` } => n.tag === "Sym" && n.name.length > 1 && n.name.startsWith(":");

export const keywordName = (n: Sym): string => n.name.slice(1);

export function showNode(n: Node): string {
  switch (n.tag) {
    case "Lit":
      if (n.value === null) return "nil";
      if (typeof n.value === "string") return JSON.stringify(n.value);
      if (typeof n.value === "boolean") return n.value ? "#t" : "#f";
      return String(n.value);
    case "Sym":
      return n.name;
    case "List":
      return `(${n.items.map(showNode).join(" ")})`;
  }
}
