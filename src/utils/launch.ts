import path from "node:path";
import { spawn } from "node:child_process";
import { assertFile } from "./fs.js";

export type Launcher = (programPath: string, filePath: string) => Promise<void>;

/** Starts `programPath` detached with `filePath` as its only argument. */
export const launchEmulator: Launcher = async (programPath, filePath) => {
  await assertFile(programPath, "Emulator");
  await assertFile(filePath, "ROM");
  const child = spawn(path.resolve(programPath), [path.resolve(filePath)], { detached: true, stdio: "ignore" });
  await new Promise<void>((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", reject);
  });
  child.unref();
};
