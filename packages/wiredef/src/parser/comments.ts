import type { IToken } from "chevrotain";
import { Comma, DocComment, Semicolon } from "./lexer.js";
import { endOffset } from "./cst.js";
import type { Comments } from "../early/types.js";

/**
 * Attaches comments to declarations by source position.
 *
 * Leading comments sit between the previous significant token and the
 * declaration, but not on the previous token's line (those trail it).
 * A trailing comment starts on the line where the declaration ends,
 * after any `,` or `;` that closes it.
 */
export class CommentIndex {
  private readonly tokens: IToken[];
  private readonly comments: IToken[];

  constructor(tokens: IToken[], comments: IToken[]) {
    this.tokens = tokens;
    this.comments = comments;
  }

  /** Comments for a declaration spanning `first`..`last` */
  attach(first: IToken | undefined, last: IToken | undefined): Comments {
    if (!first || !last) return { doc: "", comment: "" };
    const leading = this.leading(first);
    const trailing = this.trailing(last);

    const leadingDocs = leading.filter((c) => c.tokenType === DocComment);
    const docs = leadingDocs.length > 0 ? leadingDocs : trailing.filter((c) => c.tokenType === DocComment);
    return {
      doc: docs.map((c) => docText(c.image)).join("\n"),
      comment: [...leading, ...trailing].map((c) => c.image.trim()).join("\n"),
    };
  }

  leading(first: IToken): IToken[] {
    const i = this.indexOf(first);
    const prev = i > 0 ? this.tokens[i - 1] : undefined;
    return this.comments.filter(
      (c) =>
        c.startOffset < first.startOffset &&
        (!prev || (c.startOffset > endOffset(prev) && (c.startLine ?? 0) > (prev.endLine ?? 0))),
    );
  }

  trailing(last: IToken): IToken[] {
    const line = last.endLine ?? 0;
    let j = this.indexOf(last) + 1;
    while (
      j < this.tokens.length &&
      this.tokens[j].startLine === line &&
      (this.tokens[j].tokenType === Comma || this.tokens[j].tokenType === Semicolon)
    ) {
      j++;
    }
    const next = this.tokens[j];
    return this.comments.filter(
      (c) =>
        c.startOffset > endOffset(last) &&
        c.startLine === line &&
        (!next || c.startOffset < next.startOffset),
    );
  }

  private indexOf(token: IToken): number {
    let lo = 0;
    let hi = this.tokens.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const offset = this.tokens[mid].startOffset;
      if (offset === token.startOffset) return mid;
      if (offset < token.startOffset) lo = mid + 1;
      else hi = mid - 1;
    }
    return lo;
  }
}

/** `/// text` → `text` */
function docText(image: string): string {
  return image.replace(/^\/\/\/ ?/, "").trimEnd();
}
