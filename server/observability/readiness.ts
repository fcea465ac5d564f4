export type DependencyState = "ok" | "error" | "skipped";

export interface DependencyStatus {
  status: DependencyState;
  optional?: boolean;
  message?: string;
}

export interface ReadinessSnapshot {
  healthy: boolean;
  dependencies: Record<string, DependencyStatus>;
}

export interface ReadinessProbes {
  databaseConfigured: boolean;
  configIssues: string[];
  checkRecordSource: () => Promise<void>;
  checkAliasStore?: () => Promise<void>;
}

async function probe(check: () => Promise<void>, optional = false): Promise<DependencyStatus> {
  try {
    await check();
    return optional ? { status: "ok", optional } : { status: "ok" };
  } catch (error) {
    return {
      status: "error",
      ...(optional ? { optional } : {}),
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

export async function evaluateReadinessDependencies(probes: ReadinessProbes): Promise<ReadinessSnapshot> {
  const dependencies: Record<string, DependencyStatus> = {};

  if (probes.configIssues.length > 0) {
    dependencies.configuration = {
      status: "ok",
      optional: true,
      message: `Defaults applied for ${probes.configIssues.join(", ")}`,
    };
  } else {
    dependencies.configuration = { status: "ok" };
  }

  if (!probes.databaseConfigured) {
    dependencies.recordSource = {
      status: "error",
      message: "DATABASE_URL is not configured",
    };
  } else {
    dependencies.recordSource = await probe(probes.checkRecordSource);
  }

  if (!probes.checkAliasStore) {
    dependencies.aliasStore = {
      status: "skipped",
      optional: true,
      message: "Alias store not attached",
    };
  } else if (probes.databaseConfigured) {
    // a failing alias store leaves labels as "Client <id>"
    dependencies.aliasStore = await probe(probes.checkAliasStore, true);
  } else {
    dependencies.aliasStore = { status: "skipped", optional: true };
  }

  const healthy = Object.values(dependencies).every(
    (dependency) => dependency.status === "ok" || dependency.status === "skipped" || dependency.optional === true,
  );

  return { healthy, dependencies };
}
