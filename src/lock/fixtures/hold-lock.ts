/**
 * Child process for the cross-process lock tests.
 *
 * Usage: hold-lock <lockDir> <id> <hold|abandon>
 *
 * hold:    acquire the lock exclusively, report "acquired", release on the
 *          first message from the parent, then exit.
 * abandon: acquire the lock exclusively and exit without releasing it.
 */

import { GLock } from "../glock.js";

const [lockDir, id, behaviour] = process.argv.slice(2);
if (lockDir === undefined || id === undefined) {
  throw new Error("Usage: hold-lock <lockDir> <id> <hold|abandon>");
}

const handle = await new GLock(id, "exclusive", { lockDir, pollIntervalMs: 10 }).acquire();

if (behaviour === "abandon") {
  process.exit(0);
}

process.send?.("acquired");
process.once("message", () => {
  handle.release().then(
    () => process.disconnect?.(),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
});
