/**
 * Source scanner for static validation.
 *
 * Produces a copy of the source with comments and string contents blanked
 * (same length, newlines kept) so pattern checks only see code, plus the
 * decoded value of every plain string literal keyed by the offset of its
 * opening quote. Template expressions (`${...}`) stay visible as code.
 * Regex literals are not recognized and are scanned as code.
 */

export interface ScannedSource {
  code: string;
  literals: Map<number, string>;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
};

function blank(ch: string): string {
  return ch === "\n" ? "\n" : " ";
}

export function scanSource(source: string): ScannedSource {
  const out: string[] = [];
  const literals = new Map<number, string>();
  // One entry per open `${`: the brace depth inside that expression
  const templateDepths: number[] = [];
  const length = source.length;
  let i = 0;

  /** Reads a template body from i (just past "`" or "}"), stopping at "`" or "${". */
  const readTemplateBody = (start: number | null): void => {
    let value = "";
    while (i < length) {
      const ch = source[i];
      if (ch === "\\" && i + 1 < length) {
        value += SIMPLE_ESCAPES[source[i + 1]] ?? source[i + 1];
        out.push(" ", blank(source[i + 1]));
        i += 2;
        continue;
      }
      if (ch === "`") {
        out.push("`");
        i++;
        if (start !== null) literals.set(start, value);
        return;
      }
      if (ch === "$" && source[i + 1] === "{") {
        out.push("${");
        i += 2;
        templateDepths.push(0);
        return;
      }
      value += ch;
      out.push(blank(ch));
      i++;
    }
  };

  while (i < length) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === "/" && next === "/") {
      while (i < length && source[i] !== "\n") {
        out.push(" ");
        i++;
      }
      continue;
    }

    if (ch === "/" && next === "*") {
      out.push("  ");
      i += 2;
      while (i < length && !(source[i] === "*" && source[i + 1] === "/")) {
        out.push(blank(source[i]));
        i++;
      }
      if (i < length) {
        out.push("  ");
        i += 2;
      }
      continue;
    }

    if (ch === "'" || ch === "\"") {
      const start = i;
      let value = "";
      out.push(ch);
      i++;
      while (i < length && source[i] !== ch && source[i] !== "\n") {
        if (source[i] === "\\" && i + 1 < length) {
          value += SIMPLE_ESCAPES[source[i + 1]] ?? source[i + 1];
          out.push(" ", blank(source[i + 1]));
          i += 2;
          continue;
        }
        value += source[i];
        out.push(" ");
        i++;
      }
      if (i < length && source[i] === ch) {
        out.push(ch);
        i++;
      }
      literals.set(start, value);
      continue;
    }

    if (ch === "`") {
      const start = i;
      out.push("`");
      i++;
      readTemplateBody(start);
      continue;
    }

    const depth = templateDepths.length;
    if (depth > 0) {
      if (ch === "{") {
        templateDepths[depth - 1]++;
      } else if (ch === "}") {
        if (templateDepths[depth - 1] === 0) {
          templateDepths.pop();
          out.push("}");
          i++;
          readTemplateBody(null);
          continue;
        }
        templateDepths[depth - 1]--;
      }
    }

    out.push(ch);
    i++;
  }

  return { code: out.join(""), literals };
}
