export interface MetadataItem {
  key: string;
  value: string;
}

export interface JobSpec {
  /**
   * @description The name of the job. Also used as the instance name, so it
   * must be a valid Compute Engine resource name.
   */
  readonly name: string;
  /**
   * @description Path to the local bash script executed on the instance.
   */
  readonly scriptPath: string;
  /**
   * @description The image family the boot disk is created from.
   */
  readonly imageFamily: string;
  /**
   * @description The project owning the image family. Defaults to the
   * configured project.
   */
  readonly imageProject?: string;
  /**
   * @description The machine type, e.g. n1-standard-4.
   */
  readonly machineType: string;
  /**
   * @description Accelerator type label mapped to the number of devices.
   */
  readonly accelerators: Readonly<Record<string, number>>;
  /**
   * @description Whether the instance may be reclaimed by the provider.
   */
  readonly preemptible: boolean;
  /**
   * @description Extra metadata entries readable from the instance.
   */
  readonly metadata: readonly MetadataItem[];
  /**
   * @description Optional path to a script run by the instance on boot.
   */
  readonly startupScriptPath?: string;
}

export interface FireOptions {
  /**
   * @description Pause before the instance is deleted until confirmed.
   */
  waitForConfirmation?: boolean;
  /**
   * @description Seconds to wait between SSH connection attempts.
   */
  retryWait?: number;
  /**
   * @description Maximum number of SSH connection attempts.
   */
  maxRetry?: number;
}
