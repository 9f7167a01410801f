/**
 * Literal line edits on vendor configuration files.
 *
 * Edits are exact-text, line-oriented, and mirror `sed 's/find/replace/'`
 * and `sed '/anchor$/a line'`: no parsing of TOML, YAML or shell. A find
 * string that matches nothing is reported as "no-match" so the caller can
 * warn instead of leaving a loopback-only default silently in place.
 */

export type PatchOp =
  | { kind: "replace"; find: string; replace: string }
  | { kind: "insertAfter"; anchor: string; line: string };

export type PatchOpResult = "applied" | "already-applied" | "no-match";

export interface PatchReport {
  content: string;
  changed: boolean;
  results: Array<{ op: PatchOp; result: PatchOpResult }>;
}

/** Warning raised for a substitution whose expected default line is absent. */
export interface ConfigPatchWarning {
  kind: "ConfigPatchNoOp";
  path: string;
  expected: string;
}

export function replaceLine(find: string, replace: string): PatchOp {
  return { kind: "replace", find, replace };
}

export function insertAfter(anchor: string, line: string): PatchOp {
  return { kind: "insertAfter", anchor, line };
}

export function applyPatches(content: string, ops: readonly PatchOp[]): PatchReport {
  let lines = content.split("\n");
  const results: PatchReport["results"] = [];

  for (const op of ops) {
    const [next, result] = op.kind === "replace" ? applyReplace(lines, op) : applyInsertAfter(lines, op);
    lines = next;
    results.push({ op, result });
  }

  const patched = lines.join("\n");
  return { content: patched, changed: patched !== content, results };
}

/** The text a no-match op was looking for, for warning messages. */
export function expectedText(op: PatchOp): string {
  return op.kind === "replace" ? op.find : op.anchor;
}

function applyReplace(lines: string[], op: Extract<PatchOp, { kind: "replace" }>): [string[], PatchOpResult] {
  if (lines.some((l) => l.includes(op.find))) {
    return [lines.map((l) => (l.includes(op.find) ? l.replace(op.find, () => op.replace) : l)), "applied"];
  }
  if (lines.some((l) => l.includes(op.replace))) {
    return [lines, "already-applied"];
  }
  return [lines, "no-match"];
}

function applyInsertAfter(lines: string[], op: Extract<PatchOp, { kind: "insertAfter" }>): [string[], PatchOpResult] {
  if (lines.some((l) => l.trim() === op.line.trim())) {
    return [lines, "already-applied"];
  }
  if (!lines.some((l) => l.endsWith(op.anchor))) {
    return [lines, "no-match"];
  }
  return [lines.flatMap((l) => (l.endsWith(op.anchor) ? [l, op.line] : [l])), "applied"];
}
