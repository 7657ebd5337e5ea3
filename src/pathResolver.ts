import * as path from "path";

export function ensureAbsolutePath(p: string, workspaceRoot: string): string {
  return path.isAbsolute(p) ? p : path.join(workspaceRoot, p);
}
