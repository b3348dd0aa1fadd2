/**
 * Syntactic checks for the restricted mermaid flowchart subset the model
 * is allowed to emit: header, node/edge declarations, subgraph/end,
 * and styling statements. Semantics are not checked.
 */

const HEADER_RE = /^(graph|flowchart)(\s+(TD|TB|BT|RL|LR))?\s*;?$/i;
const FORBIDDEN_CONTENT_RE = /javascript:|%%\s*\{|\bon[a-z]+\s*=/i;
const HTML_TAG_RE = /<\/?[a-z][\w-]*(?=[\s>\/])|<!/i;
const INTERACTIVE_RE = /^(click|callback|href)\b/i;
const STYLING_RE = /^(classDef|class|style|linkStyle|direction)\b/;
const STATEMENT_START_RE = /^[A-Za-z0-9_][\w.-]*/;

const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

function checkBalance(line: string): string | null {
  const stack: string[] = [];
  let inQuote = false;
  let pipes = 0;

  for (const ch of line) {
    if (ch === '"') {
      inQuote = !inQuote;
      continue;
    }
    if (inQuote) continue;
    if (ch === "|") pipes++;
    if (ch === "(" || ch === "[" || ch === "{") stack.push(ch);
    const opener = CLOSERS[ch];
    if (opener !== undefined) {
      if (stack.pop() !== opener) return "unbalanced brackets";
    }
  }

  if (inQuote) return "unterminated quote";
  if (stack.length > 0) return "unbalanced brackets";
  if (pipes % 2 !== 0) return "unbalanced edge label";
  return null;
}

/**
 * Returns a list of defects; empty means the diagram is well-formed
 */
export function validateMermaid(source: string): string[] {
  const defects: string[] = [];

  if (FORBIDDEN_CONTENT_RE.test(source)) {
    defects.push("diagram: contains executable content or an init directive");
  }
  if (HTML_TAG_RE.test(source)) {
    defects.push("diagram: contains HTML markup");
  }

  const lines = source.split(/\r?\n/).map((line) => line.trim());
  const meaningful = lines
    .map((text, index) => ({ text: text.replace(/;+$/, "").trim(), lineNo: index + 1 }))
    .filter(({ text }) => text.length > 0 && !text.startsWith("%%"));

  const [header, ...statements] = meaningful;
  if (!header) {
    defects.push("diagram: empty");
    return defects;
  }
  if (!HEADER_RE.test(header.text)) {
    defects.push(`diagram: line ${header.lineNo} must be a "flowchart <direction>" or "graph <direction>" header`);
  }
  if (statements.length === 0) {
    defects.push("diagram: declares no nodes or edges");
  }

  let depth = 0;
  for (const { text, lineNo } of statements) {
    if (INTERACTIVE_RE.test(text)) {
      defects.push(`diagram: line ${lineNo} uses an interactive "${text.split(/\s/)[0]}" statement`);
      continue;
    }
    if (/^subgraph\b/.test(text)) {
      depth++;
    } else if (text === "end") {
      depth--;
      if (depth < 0) {
        defects.push(`diagram: line ${lineNo} "end" without a matching subgraph`);
        depth = 0;
      }
      continue;
    } else if (!STYLING_RE.test(text) && !STATEMENT_START_RE.test(text)) {
      defects.push(`diagram: line ${lineNo} is not a node or edge declaration`);
      continue;
    }

    const balance = checkBalance(text);
    if (balance) defects.push(`diagram: line ${lineNo} has ${balance}`);
  }

  if (depth > 0) {
    defects.push(`diagram: ${depth} subgraph(s) not closed with "end"`);
  }

  return defects;
}
