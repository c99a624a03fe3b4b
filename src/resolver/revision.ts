import { ConfigurationError, InsufficientHistoryError, RevisionNotFoundError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import { withSpan } from '../observability/tracing';
import { CloneDepth, CommitEntry, GitClient, isFullCommitId, looksLikeCommitId, REMOTE_HEAD, remoteRef } from '../git/types';
import { ResolvedRevision, Selector } from './types';

export type CutoffSearchResult =
  | { kind: 'found'; commit: CommitEntry }
  | { kind: 'exhausted'; truncated: boolean };

export interface RevisionResolverOptions {
  logger?: Logger;
  clock?: () => Date;
}

export interface ResolveContext {
  /** Depth the mirror was cloned with, reported when history runs out. */
  depth: CloneDepth;
}

/**
 * Validate a selector and return a frozen copy.
 */
export function normalizeSelector(selector: Selector): Selector {
  const ref = selector.ref?.trim() || undefined;
  const revision = selector.revision?.trim() || undefined;

  if (ref && (ref.startsWith('-') || /\s|\.\.|[~^:?*[\\]/.test(ref))) {
    throw new ConfigurationError(`Invalid branch or tag name: '${ref}'`);
  }
  if (revision && !looksLikeCommitId(revision)) {
    throw new ConfigurationError(`Revision must be a commit id (4 to 64 hex digits): '${revision}'`);
  }
  if (selector.cutoff && Number.isNaN(selector.cutoff.getTime())) {
    throw new ConfigurationError('Cutoff date is not a valid date');
  }
  return Object.freeze({ ref, revision, cutoff: selector.cutoff ? new Date(selector.cutoff.getTime()) : undefined });
}

/**
 * Walk commits tip first and stop at the first one committed at or before
 * `cutoff`. Commits sharing a timestamp resolve toward the tip.
 */
export async function firstCommitAtOrBefore(
  commits: AsyncIterable<CommitEntry>,
  cutoff: Date,
): Promise<CutoffSearchResult> {
  let truncated = false;
  for await (const commit of commits) {
    if (commit.timestamp.getTime() <= cutoff.getTime()) {
      return { kind: 'found', commit };
    }
    truncated = truncated || commit.boundary;
  }
  return { kind: 'exhausted', truncated };
}

export class RevisionResolver {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly git: GitClient, options: RevisionResolverOptions = {}) {
    this.logger = options.logger ?? getLogger('gitfs:resolver');
    this.clock = options.clock ?? (() => new Date());
  }

  async resolve(directory: string, selector: Selector, context: ResolveContext): Promise<ResolvedRevision> {
    return withSpan('gitfs.resolve', { ref: selector.ref, revision: selector.revision }, async () => {
      if (selector.revision) {
        if (selector.cutoff) {
          this.logger.warn('Both revision and cutoff given; the cutoff is ignored', {
            revision: selector.revision,
            cutoff: selector.cutoff.toISOString(),
          });
        }
        return this.freeze(await this.verifyRevision(directory, selector.revision), selector.ref);
      }

      const ref = selector.ref ?? REMOTE_HEAD;
      const tip = await this.resolveTip(directory, ref);
      if (!selector.cutoff) {
        return this.freeze(tip, ref);
      }

      const result = await firstCommitAtOrBefore(this.git.log(directory, tip), selector.cutoff);
      if (result.kind === 'found') {
        this.logger.debug('Resolved cutoff', {
          ref,
          cutoff: selector.cutoff.toISOString(),
          commit: result.commit.commitId,
        });
        return this.freeze(result.commit.commitId, ref);
      }
      if (result.truncated) {
        throw new InsufficientHistoryError(ref, selector.cutoff, context.depth);
      }
      throw new RevisionNotFoundError(
        `${ref}@${selector.cutoff.toISOString()}`,
        `No commit on '${ref}' at or before ${selector.cutoff.toISOString()}`,
      );
    });
  }

  /**
   * Commit at the tip of a branch or tag, looked up in the fetched
   * remote-tracking refs first and the mirror's own refs after that.
   */
  async resolveTip(directory: string, ref: string): Promise<string> {
    const candidates = [remoteRef(ref), `refs/tags/${ref}`, `refs/heads/${ref}`];
    for (const candidate of candidates) {
      const commit = await this.git.resolveCommit(directory, candidate);
      if (commit) {
        return commit;
      }
    }
    throw new RevisionNotFoundError(ref, `Branch or tag not found in mirror: ${ref}`);
  }

  /**
   * Full ids come back exactly as given; abbreviations expand to the unique
   * full id. History is not consulted.
   */
  async verifyRevision(directory: string, revision: string): Promise<string> {
    const commit = await this.git.resolveCommit(directory, revision);
    if (!commit || !commit.toLowerCase().startsWith(revision.toLowerCase())) {
      throw new RevisionNotFoundError(revision);
    }
    return isFullCommitId(revision) ? revision : commit;
  }

  private freeze(commitId: string, ref?: string): ResolvedRevision {
    return Object.freeze({ commitId, resolvedAt: this.clock(), ref });
  }
}
