/**
 * CLI constants
 */

import { readFileSync } from "node:fs";

const readVersion = (): string => {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
  );
  return typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";
};

export const VERSION = readVersion();
