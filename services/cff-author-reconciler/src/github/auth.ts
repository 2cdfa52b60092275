import { createAppAuth } from "@octokit/auth-app";

export interface GitHubAuth {
  getInstallationToken(installationId: number): Promise<string>;
}

/**
 * GitHub App authentication. The private key arrives base64-encoded so it
 * can live in a single-line environment variable.
 */
export function createGitHubAuth(appId: number, privateKeyBase64: string): GitHubAuth {
  const auth = createAppAuth({
    appId,
    privateKey: Buffer.from(privateKeyBase64, "base64").toString("utf8"),
  });

  return {
    async getInstallationToken(installationId: number): Promise<string> {
      const { token } = await auth({ type: "installation", installationId });
      return token;
    },
  };
}
