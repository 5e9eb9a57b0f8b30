import { relative } from "node:path";

export function toDisplayPath(path: string): string {
  const rel = relative(process.cwd(), path);
  if (!rel || rel === "") return ".";
  return rel.startsWith("..") ? path : rel;
}
