/**
 * In-archive member names
 */

import * as path from "node:path";
import type { WalkEntryKind } from "../../types";
import { defaultPathMatcher, type PathMatcher } from "./path-matcher";

/**
 * Name of an entry inside the archive: its path relative to the parent of
 * the longest source root containing it, so each root keeps its own folder
 * name at the top level. Entries outside every root fall back to their base
 * name. Directory names end with "/".
 */
export function archiveMemberName(
  entryPath: string,
  kind: WalkEntryKind,
  roots: readonly string[],
  matcher: PathMatcher = defaultPathMatcher,
): string {
  const resolved = path.resolve(entryPath);
  const candidates = roots
    .map((root) => path.resolve(root))
    .sort((a, b) => b.length - a.length);

  let name = path.basename(resolved);
  for (const root of candidates) {
    if (matcher.isUnder(resolved, root)) {
      name = path.relative(path.dirname(root), resolved);
      break;
    }
  }

  const portable = name.split(path.sep).filter((part) => part.length > 0).join("/");
  if (portable.length === 0) {
    return "";
  }
  return kind === "directory" ? `${portable}/` : portable;
}
