/**
 * Background service (launchd/systemd unit managed by `brew services`)
 */

export type ServiceStatus = "started" | "stopped" | "error" | "unknown";

export interface Service {
  name: string;
  status: ServiceStatus;
  user?: string;
  file?: string;
}

/**
 * Map the status column of `brew services list` to a status
 */
export function parseServiceStatus(raw: string): ServiceStatus {
  const status = raw.toLowerCase();
  if (status.includes("started")) return "started";
  if (status.includes("stopped") || status.includes("none")) return "stopped";
  if (status.includes("error")) return "error";
  return "unknown";
}

export function isServiceRunning(service: Service): boolean {
  return service.status === "started";
}
