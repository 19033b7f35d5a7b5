import fse from "fs-extra";

import { headSha } from "../git/git.js";

export const UNKNOWN_VERSION = "unknown";

/** The VERSION file's first line, else the repository HEAD sha, else "unknown". */
export async function resolveFrameworkVersion(
  versionFile: string,
  projectRoot: string,
): Promise<string> {
  if (await fse.pathExists(versionFile)) {
    const stat = await fse.stat(versionFile);
    if (stat.isFile()) {
      const firstLine = (await fse.readFile(versionFile, "utf8")).split("\n")[0]?.trim() ?? "";
      if (firstLine.length > 0) return firstLine;
    }
  }

  try {
    return await headSha(projectRoot);
  } catch {
    return UNKNOWN_VERSION;
  }
}
