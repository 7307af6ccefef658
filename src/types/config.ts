/** Configuration types — layered config system (base.yaml ← env.yaml ← DEPLOYCTL_*). */
export type OutputFormat = "human" | "jsonl";

export type ServiceConfig = {
  /** Fixed instance name; the identity `Stopping` removes. */
  name: string;
  image: string;
  host_port: number;
};

export type VerifyConfig = {
  /** Defaults to the recipe's healthcheck start_period. */
  grace_ms?: number;
  poll_interval_ms: number;
  /** Defaults to start_period + retries × interval. */
  timeout_ms?: number;
  /** Worst-case application cold start; the probe must outlast it. */
  cold_start_ms?: number;
};

export type DeployConfig = {
  schema_version: string;
  service: ServiceConfig;
  env_file: string;
  context_dir: string;
  /** Recipe file, relative to the config directory. */
  recipe: string;
  verify: VerifyConfig;
  open_browser: boolean;
};
