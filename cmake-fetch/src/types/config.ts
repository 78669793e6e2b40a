/** Configuration types: layered config system (base.yaml ← env yaml ← env vars ← CLI flags). */
export type RepoName = "github" | "kitware";

export type OutputFormat = "human" | "jsonl";

export type GithubChannelConfig = {
  releases_api: string;
  download_base: string;
};

export type KitwareChannelConfig = {
  download_base: string;
  latest_base: string;
};

export type FetchConfig = {
  schema_version: string;
  product: string;
  repo: string;
  timeout_seconds: number;
  manifest_schema: number;
  trusted_keys_dir: string;
  gpg_binary: string;
  format: OutputFormat;
  github_token?: string;
  channels: {
    github: GithubChannelConfig;
    kitware: KitwareChannelConfig;
  };
};
