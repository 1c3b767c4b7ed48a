/**
 * Component health registry backing GET /api/health
 */

export type ComponentStatus = "healthy" | "degraded" | "unhealthy" | "unknown";

export type ComponentHealth = {
  status: ComponentStatus;
  lastError: string | null;
  /** ISO-8601 */
  lastChecked: string;
  /** Newest last, each prefixed with "HH:mm:ss: " (UTC) */
  repairActions: string[];
};

export type HealthSnapshot = {
  status: ComponentStatus;
  timestamp: string;
  components: Record<string, ComponentHealth>;
};

export const MAX_REPAIR_ACTIONS = 20;

/**
 * Worst status wins; no components means healthy
 */
export function overallStatus(statuses: Iterable<ComponentStatus>): ComponentStatus {
  let overall: ComponentStatus = "healthy";
  for (const status of statuses) {
    if (status === "unhealthy") return "unhealthy";
    if (status === "degraded") overall = "degraded";
  }
  return overall;
}

export class HealthReporter {
  private readonly components = new Map<string, ComponentHealth>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  report(component: string, status: ComponentStatus, lastError?: string): void {
    const entry = this.entry(component);
    entry.status = status;
    entry.lastError = lastError ?? null;
    entry.lastChecked = new Date(this.now()).toISOString();
  }

  recordRepair(component: string, action: string): void {
    const entry = this.entry(component);
    const time = new Date(this.now()).toISOString().slice(11, 19);
    entry.repairActions.push(`${time}: ${action}`);
    if (entry.repairActions.length > MAX_REPAIR_ACTIONS) {
      entry.repairActions.splice(0, entry.repairActions.length - MAX_REPAIR_ACTIONS);
    }
  }

  get(component: string): ComponentHealth | undefined {
    const entry = this.components.get(component);
    return entry ? { ...entry, repairActions: [...entry.repairActions] } : undefined;
  }

  snapshot(): HealthSnapshot {
    const components: Record<string, ComponentHealth> = {};
    for (const name of this.components.keys()) {
      const entry = this.get(name);
      if (entry) components[name] = entry;
    }
    return {
      status: overallStatus(Object.values(components).map((entry) => entry.status)),
      timestamp: new Date(this.now()).toISOString(),
      components,
    };
  }

  private entry(component: string): ComponentHealth {
    let entry = this.components.get(component);
    if (!entry) {
      entry = { status: "unknown", lastError: null, lastChecked: new Date(this.now()).toISOString(), repairActions: [] };
      this.components.set(component, entry);
    }
    return entry;
  }
}
