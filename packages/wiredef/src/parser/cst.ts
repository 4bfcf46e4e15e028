import type { CstElement, CstNode, IToken } from "chevrotain";

// ── Token / CST node helpers ────────────────────────────────────────────

export function isCstNode(element: CstElement): element is CstNode {
  return "children" in element;
}

export function isToken(element: CstElement): element is IToken {
  return "image" in element;
}

export function sub(node: CstNode, ruleName: string): CstNode | undefined {
  return node.children[ruleName]?.find(isCstNode);
}

export function subs(node: CstNode, ruleName: string): CstNode[] {
  return (node.children[ruleName] ?? []).filter(isCstNode);
}

export function tok(node: CstNode, tokenName: string): IToken | undefined {
  return node.children[tokenName]?.find(isToken);
}

export function toks(node: CstNode, tokenName: string): IToken[] {
  return (node.children[tokenName] ?? []).filter(isToken);
}

export function line(token: IToken | undefined): number {
  return token?.startLine ?? 0;
}

export function endOffset(token: IToken): number {
  return token.endOffset ?? token.startOffset + token.image.length - 1;
}

/** Every token under `node`, in source order. Recovery-inserted tokens are dropped. */
export function collectTokens(node: CstNode, out: IToken[] = []): IToken[] {
  for (const children of Object.values(node.children)) {
    for (const child of children) {
      if (isCstNode(child)) collectTokens(child, out);
      else if (!Number.isNaN(child.startOffset)) out.push(child);
    }
  }
  return out.sort((a, b) => a.startOffset - b.startOffset);
}

export function findFirstToken(node: CstNode): IToken | undefined {
  return collectTokens(node)[0];
}

export function findLastToken(node: CstNode): IToken | undefined {
  return collectTokens(node).at(-1);
}

/* ── extractNameToken: get string from nameToken CST node ── */
export function extractNameToken(node: CstNode): string {
  for (const children of Object.values(node.children)) {
    const first = children.find(isToken);
    if (first) return first.image;
  }
  return "";
}
