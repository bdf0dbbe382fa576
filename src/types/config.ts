/** Forwarder configuration after defaults, config file and environment are merged. */
export interface ForwarderConfig {
  /** Absolute path to the LEAN CLI, or null to look `lean` up on the search path. */
  readonly executable: string | null;
  readonly environment: {
    /** Virtual environment directory; relative values resolve against the working directory. */
    readonly dir: string;
    readonly enabled: boolean;
  };
}
