/**
 * Parsing of `origin` remote URLs into provider coordinates
 */

export interface AzureRepoCoordinates {
  readonly orgUrl: string;
  readonly project: string;
  readonly repo: string;
}

const GITHUB_SSH = /^git@github\.com:([^/]+)\/(.+?)(?:\.git)?$/;
const GITHUB_HTTPS = /^https?:\/\/github\.com\/([^/]+)\/(.+?)(?:\.git)?$/;
const AZURE_HTTPS = /^(https?):\/\/(?:[^@/]+@)?dev\.azure\.com\/([^/]+)\/([^/]+)\/_git\/([^/]+)$/;

/**
 * Returns `owner/repo` for a github.com SSH or HTTPS remote, else null
 */
export function parseGitHubRemote(url: string): string | null {
  const trimmed = url.trim();
  const match = GITHUB_SSH.exec(trimmed) ?? GITHUB_HTTPS.exec(trimmed);
  if (!match) {
    return null;
  }
  return `${match[1]}/${match[2]}`;
}

/**
 * Splits `https://dev.azure.com/{org}/{project}/_git/{repo}` into its parts
 *
 * A user name in front of the host (as the Azure Repos clone dialog adds it)
 * is dropped from the organization URL.
 */
export function parseAzureRemote(url: string): AzureRepoCoordinates | null {
  const match = AZURE_HTTPS.exec(url.trim());
  if (!match) {
    return null;
  }

  const [, scheme, org, project, repo] = match;
  return {
    orgUrl: `${scheme}://dev.azure.com/${org}`,
    project,
    repo
  };
}
