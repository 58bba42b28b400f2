/** Opaque identifier naming an exact source state (a commit SHA). */
export type Revision = string;

/** Identifier the control plane returns for a submitted build. */
export type BuildHandle = string;

export type BuildRecord = {
  handle: BuildHandle;
  revision: Revision;
  rawStatus: string;
};

/**
 * The only gateway to the remote build-and-deploy control plane.
 * Implementations throw `RemoteError` for transport and application failures.
 */
export interface RemoteControlClient {
  /** Throws `SubmissionError` when the acknowledgement carries no usable handle. */
  submitBuild(revision: Revision): Promise<BuildHandle>;
  /** Recent builds in no guaranteed order; may not yet include a just-submitted build. */
  listRecentBuilds(limit: number): Promise<BuildRecord[]>;
  /** Must acknowledge without effect when `revision` is already live. */
  requestDeployment(revision: Revision): Promise<void>;
  /** Currently live revision, or "" when nothing is deployed. */
  getDeployedRevision(): Promise<Revision>;
}
