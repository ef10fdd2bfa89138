/** Turns a remote node name into a single safe path segment. */
export function toPathSegment(name: string): string {
  const cleaned = name.replace(/[/\\\0]/g, "_").trim();
  if (cleaned === "" || cleaned === "." || cleaned === "..") return "_";
  return cleaned;
}
