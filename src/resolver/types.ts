/**
 * Which commit's files to expose. `revision` is authoritative when set; `ref`
 * then only names the branch or tag to fetch it from.
 */
export interface Selector {
  /** Branch or tag. The remote's default branch when absent. */
  ref?: string;
  /** Full or abbreviated commit id. */
  revision?: string;
  /** Narrows `ref` to its latest commit at or before this instant. */
  cutoff?: Date;
}

export interface ResolvedRevision {
  readonly commitId: string;
  readonly resolvedAt: Date;
  readonly ref?: string;
}
