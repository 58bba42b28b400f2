import { describe, expect, it } from "vitest";
import { PublishError, ResolutionError } from "../src/core/errors.js";
import { GitPushPublisher, GitRevisionSource } from "../src/git/revision-source.js";

const HEAD = "3f2a9c1d4b5e6f708192a3b4c5d6e7f8091a2b3c";

describe("GitRevisionSource", () => {
  it("resolves HEAD when no revision is given", async () => {
    const source = new GitRevisionSource({ getCurrentSha: async () => HEAD });
    await expect(source.resolve()).resolves.toBe(HEAD);
  });

  it("prefers an explicit revision and does not read git", async () => {
    let called = false;
    const source = new GitRevisionSource(
      {
        getCurrentSha: async () => {
          called = true;
          return HEAD;
        },
      },
      " abc123 ",
    );
    await expect(source.resolve()).resolves.toBe("abc123");
    expect(called).toBe(false);
  });

  it("rejects a blank explicit revision", async () => {
    const source = new GitRevisionSource({ getCurrentSha: async () => HEAD }, "  ");
    await expect(source.resolve()).rejects.toBeInstanceOf(ResolutionError);
  });

  it("rejects an explicit revision with inner whitespace", async () => {
    const source = new GitRevisionSource({ getCurrentSha: async () => HEAD }, "abc 123");
    await expect(source.resolve()).rejects.toThrow('revision resolution failed: invalid revision: "abc 123"');
  });

  it("fails when git cannot resolve HEAD", async () => {
    const source = new GitRevisionSource({
      getCurrentSha: async () => {
        throw new Error("fatal: not a git repository");
      },
    });
    await expect(source.resolve()).rejects.toThrow(
      "revision resolution failed: git rev-parse HEAD: fatal: not a git repository",
    );
  });

  it("fails when HEAD is not a sha", async () => {
    const source = new GitRevisionSource({ getCurrentSha: async () => "HEAD" });
    await expect(source.resolve()).rejects.toThrow('revision resolution failed: HEAD is not a commit sha: "HEAD"');
  });
});

describe("GitPushPublisher", () => {
  it("pushes the configured branch", async () => {
    const pushes: string[] = [];
    const publisher = new GitPushPublisher({ push: async (remote, branch) => void pushes.push(`${remote}/${branch}`) }, "origin", "main");
    await expect(publisher.publish(HEAD)).resolves.toBe(true);
    expect(pushes).toEqual(["origin/main"]);
  });

  it("skips when disabled", async () => {
    const pushes: string[] = [];
    const publisher = new GitPushPublisher({ push: async () => void pushes.push("x") }, "origin", "main", false);
    await expect(publisher.publish(HEAD)).resolves.toBe(false);
    expect(pushes).toEqual([]);
  });

  it("wraps push failures as PublishError", async () => {
    const publisher = new GitPushPublisher(
      {
        push: async () => {
          throw new Error("rejected (non-fast-forward)");
        },
      },
      "origin",
      "main",
    );
    const err = await publisher.publish(HEAD).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PublishError);
    expect(err).toMatchObject({ message: "publish failed: git push origin main: rejected (non-fast-forward)" });
  });
});
