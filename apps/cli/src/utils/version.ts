import { readFileSync } from "node:fs";

interface PackageJson {
  version?: string;
}

const FALLBACK_VERSION = "0.0.0";

const isPackageJson = (value: unknown): value is PackageJson =>
  typeof value === "object" && value !== null;

export const getVersion = (): string => {
  try {
    const pkgPath = new URL("../../package.json", import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (isPackageJson(pkg) && typeof pkg.version === "string") {
      return pkg.version;
    }
    return FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
};
