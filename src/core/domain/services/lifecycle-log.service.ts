export interface ILifecycleLog {
  /** Appends one record; returns false when the record had to be dropped. */
  log(message: string): boolean;
}
