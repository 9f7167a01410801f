import type { RunReport } from "./driver.js";

/**
 * Human-readable run summary. The success line is only printed when every
 * engine ended up skipped or provisioned.
 */
export function formatSummary(report: RunReport): string {
  const lines: string[] = [];

  lines.push(`Profile '${report.profile.name}': ${report.profile.outcome}`);
  for (const c of report.containers) {
    lines.push(`Container '${c.name}': ${c.status}${c.error ? ` (${c.error})` : ""}`);
  }
  for (const e of report.engines) {
    const detail = e.error ? ` [${e.errorKind ?? "Error"}] ${e.error}` : "";
    lines.push(`Engine ${e.engine}: ${e.status}${detail}`);
    for (const w of e.warnings) {
      lines.push(`  warning: ${w.path}: expected "${w.expected}" not found, override not applied`);
    }
  }

  if (report.ok) {
    lines.push("Setup complete. All containers are configured and should be running their respective search engines.");
  } else {
    const failed = report.engines.filter((e) => e.status === "failed").map((e) => e.engine);
    lines.push(`Setup incomplete. Failed engines: ${failed.join(", ")}.`);
  }

  return lines.join("\n");
}
