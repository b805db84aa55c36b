import { describe, expect, it } from "vitest";
import {
  GITHUB_ACTIONS_ISSUER,
  escapeRegExp,
  githubActionsPolicy,
  gitlabPolicy,
  matchIdentity,
} from "../../src/sigstore/policy.js";

const RELEASE_SAN =
  "https://github.com/octo/demo/.github/workflows/release.yml@refs/tags/v1.0.0";

describe("certificate identity policy", () => {
  it("builds a repository-scoped GitHub Actions policy", () => {
    expect(githubActionsPolicy("octo/demo")).toEqual({
      issuer: GITHUB_ACTIONS_ISSUER,
      subjectPattern: "^https://github\\.com/octo\\/demo/",
    });
    expect(githubActionsPolicy().subjectPattern).toBe("^https://github\\.com/");
  });

  it("builds a GitLab policy", () => {
    expect(gitlabPolicy("group/project")).toEqual({
      issuer: "https://gitlab.com",
      subjectPattern: "^https://gitlab\\.com/group\\/project//",
    });
  });

  it("accepts a matching identity", () => {
    expect(
      matchIdentity(githubActionsPolicy("octo/demo"), {
        issuer: GITHUB_ACTIONS_ISSUER,
        subjectAlternativeName: RELEASE_SAN,
      }),
    ).toEqual([]);
  });

  it("rejects a workflow from a look-alike repository", () => {
    const policy = githubActionsPolicy("octo/demo");
    const san =
      "https://github.com/octo/demo-fork/.github/workflows/release.yml@refs/heads/main";

    expect(
      matchIdentity(policy, {
        issuer: GITHUB_ACTIONS_ISSUER,
        subjectAlternativeName: san,
      }),
    ).toEqual([
      `certificate identity '${san}' does not match ^https://github\\.com/octo\\/demo/`,
    ]);
  });

  it("reports every violated constraint", () => {
    expect(matchIdentity(githubActionsPolicy(), {})).toEqual([
      `certificate issuer <missing> does not equal ${GITHUB_ACTIONS_ISSUER}`,
      "certificate identity <missing> does not match ^https://github\\.com/",
    ]);
  });

  it("accepts any identity under an empty policy", () => {
    expect(matchIdentity({}, {})).toEqual([]);
  });

  it("escapes regular expression syntax", () => {
    expect(escapeRegExp("a.b/c+d")).toBe("a\\.b\\/c\\+d");
  });
});
