import { describe, expect, it, vi } from "vitest";
import { GitOperations } from "../src/git/operations.js";

function fakeGit(revparse: string) {
  return {
    revparse: vi.fn(async (_args: string[]) => revparse),
    push: vi.fn(async (_remote: string, _branch: string) => ({ pushed: [] })),
  };
}

describe("git operations", () => {
  it("reads HEAD and trims the output", async () => {
    const git = fakeGit("3f2a9c1d4b5e6f708192a3b4c5d6e7f8091a2b3c\n");
    const ops = new GitOperations("/repo", git);

    await expect(ops.getCurrentSha()).resolves.toBe("3f2a9c1d4b5e6f708192a3b4c5d6e7f8091a2b3c");
    expect(git.revparse).toHaveBeenCalledWith(["HEAD"]);
  });

  it("resolves another ref when asked", async () => {
    const git = fakeGit("abc1234\n");
    await new GitOperations("/repo", git).getCurrentSha("origin/main");
    expect(git.revparse).toHaveBeenCalledWith(["origin/main"]);
  });

  it("pushes remote and branch", async () => {
    const git = fakeGit("");
    await new GitOperations("/repo", git).push("origin", "main");
    expect(git.push).toHaveBeenCalledWith("origin", "main");
  });

  it("propagates push failures", async () => {
    const git = fakeGit("");
    git.push.mockRejectedValueOnce(new Error("remote rejected"));
    await expect(new GitOperations("/repo", git).push("origin", "main")).rejects.toThrow("remote rejected");
  });
});
