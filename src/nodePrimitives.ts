/** Returns true when the value is an errno-flavoured error (`node:fs`, `node:net`) with the given code. */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
