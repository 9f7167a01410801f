/** Fields of a simple long-running service unit. */
export interface ServiceUnit {
  description: string;
  workingDirectory: string;
  execStart: string;
  user: string;
  group: string;
  after?: string;
  restart?: "on-failure" | "always" | "no";
  wantedBy?: string;
}

/**
 * Render a systemd unit file. The layout is fixed so a re-run writes a
 * byte-identical file.
 */
export function renderUnit(unit: ServiceUnit): string {
  return `[Unit]
Description=${unit.description}
After=${unit.after ?? "systemd-user-sessions.service"}

[Service]
Type=simple
WorkingDirectory=${unit.workingDirectory}
ExecStart=${unit.execStart}
User=${unit.user}
Group=${unit.group}
Restart=${unit.restart ?? "on-failure"}

[Install]
WantedBy=${unit.wantedBy ?? "multi-user.target"}
`;
}

export function unitPath(service: string): string {
  return `/etc/systemd/system/${service}.service`;
}
