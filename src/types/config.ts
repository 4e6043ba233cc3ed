/** Configuration types — layered config system. */
export type LgiConfig = {
  schema_version: string;
  /** Reconstruction binary invoked for each pending timepoint. */
  recon_command: string;
  /** Environment variable that names the reference subjects directory. */
  reference_dir_env: string;
  /** Variables removed from every child environment. */
  strip_env: string[];
  shared_assets: string[];
  surf_subdir: string;
  /** Hemisphere files whose presence marks a timepoint complete. */
  lgi_outputs: string[];
  /** Variable through which the license key reaches the reconstruction tool. */
  license_env: string;
  version_file: string;
};
