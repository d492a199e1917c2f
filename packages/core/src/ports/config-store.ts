export interface ConfigStore {
  /** Raw stored configuration, or null when nothing has been saved. */
  load(): Promise<unknown>;
  save(config: unknown): Promise<void>;
  reset(): Promise<void>;
  readonly location: string;
}
