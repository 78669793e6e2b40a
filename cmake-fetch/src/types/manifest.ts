/** Release manifest types: the `files-v1` document published beside each release. */

export type ManifestVersion = {
  major: number;
  minor: number;
  patch: number;
  suffix?: string;
  string: string;
};

export type HashFileDescriptor = {
  algorithm: string[];
  name: string;
  signature?: string[];
  deprecated?: string | null;
};

export type ArtifactDescriptor = {
  name: string;
  os: string[];
  architecture: string[];
  class: string;
  deprecated?: string | null;
  [extra: string]: unknown;
};

export type ReleaseManifest = {
  version?: ManifestVersion;
  hashFiles: HashFileDescriptor[];
  files: ArtifactDescriptor[];
};

/** Trusted digests keyed by artifact file name. */
export type HashRecord = Map<string, string>;
