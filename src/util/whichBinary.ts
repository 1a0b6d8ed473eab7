import { execFile } from "node:child_process";

/** True when `name` resolves on PATH. */
export function whichBinary(name: string): Promise<boolean> {
  const lookup = process.platform === "win32" ? "where" : "which";
  return new Promise((resolve) => {
    execFile(lookup, [name], (err) => resolve(!err));
  });
}
