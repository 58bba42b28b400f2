import { PublishError, ResolutionError, errorMessage } from "../core/errors.js";
import type { Revision } from "../remote/client.js";
import type { GitOperations } from "./operations.js";

const SHA_PATTERN = /^[0-9a-f]{7,40}$/i;

/** Produces the target revision for one invocation. */
export interface RevisionSource {
  resolve(): Promise<Revision>;
}

/** Makes a revision fetchable by the control plane's version store. */
export interface Publisher {
  /** Returns false when publishing was skipped. */
  publish(revision: Revision): Promise<boolean>;
}

/** Uses an explicit revision when given (taken as-is), otherwise the repository's HEAD. */
export class GitRevisionSource implements RevisionSource {
  constructor(
    private readonly git: Pick<GitOperations, "getCurrentSha">,
    private readonly explicit?: string,
  ) {}

  async resolve(): Promise<Revision> {
    if (this.explicit !== undefined) {
      const rev = this.explicit.trim();
      if (rev === "" || /\s/.test(rev)) throw new ResolutionError(`invalid revision: "${this.explicit}"`);
      return rev;
    }

    let sha: string;
    try {
      sha = await this.git.getCurrentSha();
    } catch (e) {
      throw new ResolutionError(`git rev-parse HEAD: ${errorMessage(e)}`, { cause: e });
    }
    if (!SHA_PATTERN.test(sha)) throw new ResolutionError(`HEAD is not a commit sha: "${sha}"`);
    return sha;
  }
}

export class GitPushPublisher implements Publisher {
  constructor(
    private readonly git: Pick<GitOperations, "push">,
    private readonly remote: string,
    private readonly branch: string,
    private readonly enabled = true,
  ) {}

  async publish(_revision: Revision): Promise<boolean> {
    if (!this.enabled) return false;
    try {
      await this.git.push(this.remote, this.branch);
    } catch (e) {
      throw new PublishError(`git push ${this.remote} ${this.branch}: ${errorMessage(e)}`, { cause: e });
    }
    return true;
  }
}
