/** Configuration types — layered config system (base.yaml ← env.yaml ← CONVERGE_* ← flags). */
export type UnknownStatusPolicy = "poll" | "fail";

export type ConvergeConfig = {
  project_id: string;
  service_id: string;
  repo_dir: string;
  git_remote: string;
  git_branch: string;
  push: boolean;
  cli_bin: string;
  builds_page_size: number;
  poll_interval_sec: number;
  build_timeout_sec: number;
  deploy_timeout_sec: number;
  command_timeout_sec: number;
  unknown_status_policy: UnknownStatusPolicy;
  runs_dir: string;
};

export const DEFAULT_CONFIG: Omit<ConvergeConfig, "project_id" | "service_id"> = {
  repo_dir: ".",
  git_remote: "origin",
  git_branch: "main",
  push: true,
  cli_bin: "northflank",
  builds_page_size: 40,
  poll_interval_sec: 5,
  build_timeout_sec: 900,
  deploy_timeout_sec: 600,
  command_timeout_sec: 60,
  unknown_status_policy: "poll",
  runs_dir: ".converge/runs",
};
