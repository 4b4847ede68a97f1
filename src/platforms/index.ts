import type { PlatformSettings } from "../config.js";
import type { HostingPlatform } from "../types/index.js";
import { GitHubPlatform } from "./github.js";
import { GitLabPlatform } from "./gitlab.js";

export { GitHubPlatform, parseRepoRef } from "./github.js";
export { GitLabPlatform } from "./gitlab.js";

export function createPlatform(settings: PlatformSettings): HostingPlatform {
  switch (settings.kind) {
    case "gitlab":
      return new GitLabPlatform({ url: settings.url, token: settings.token });
    case "github":
      return new GitHubPlatform({ token: settings.token, apiUrl: settings.apiUrl });
  }
}
