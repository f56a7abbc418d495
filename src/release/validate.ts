import { ValidationError } from "../core/errors.js";
import type { Plan } from "../versioning/types.js";

import type { PackagedPackage } from "./archive.js";

// Checks the packaged set against the plan before anything is uploaded.
export function validatePackaged(plan: Plan, packaged: readonly PackagedPackage[]): void {
  if (packaged.length !== plan.size) {
    throw new ValidationError(
      `Packaged ${packaged.length} package(s) but the plan has ${plan.size}`,
    );
  }

  const expected = [...plan.keys()].sort();
  const actual = packaged.map((entry) => entry.packageName).sort();
  if (expected.join("\n") !== actual.join("\n")) {
    throw new ValidationError(
      `Packaged packages [${actual.join(", ")}] do not match the plan [${expected.join(", ")}]`,
    );
  }

  for (const entry of packaged) {
    const hasTar = entry.files.some((file) => file.endsWith(".tar.gz"));
    const hasZip = entry.files.some((file) => file.endsWith(".zip"));
    if (!hasTar || !hasZip) {
      throw new ValidationError(
        `Package ${entry.packageName} is missing an archive (tar.gz=${hasTar}, zip=${hasZip})`,
      );
    }
  }
}
