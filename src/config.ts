import { resolve } from "node:path";

import { CatalogError } from "./errors.js";
import { isDirectory } from "./fs-utils.js";
import { rejectPathTraversalInput } from "./safe-path.js";

export const ROOT_ENV_VAR = "CATALOG_ROOT";

type ResolveCatalogRootArgs = {
  cwd: string;
  rootOverride?: string;
  env?: NodeJS.ProcessEnv;
};

/** `--root`, then `$CATALOG_ROOT`, then the working directory. */
export async function resolveCatalogRoot(args: ResolveCatalogRootArgs): Promise<string> {
  const cwdAbs = resolve(args.cwd);
  const fromEnv = args.env?.[ROOT_ENV_VAR]?.trim();

  let candidate: string;
  if (args.rootOverride) {
    rejectPathTraversalInput(args.rootOverride, "--root");
    candidate = resolve(cwdAbs, args.rootOverride);
  } else if (fromEnv) {
    candidate = resolve(cwdAbs, fromEnv);
  } else {
    candidate = cwdAbs;
  }

  if (!(await isDirectory(candidate))) {
    throw new CatalogError(`Catalog root is not a directory: ${candidate}`);
  }
  return candidate;
}
