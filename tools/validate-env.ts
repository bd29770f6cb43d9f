import path from "node:path";
import { getMissingEnvVars, loadEnvFile } from "../packages/shared/src/env/validator";
import type { EnvService } from "../packages/shared/src/env/schema";

const TEMPLATES: Array<{ service: EnvService; path: string }> = [
  { service: "root", path: ".env.example" },
  { service: "cli", path: "env/.env.cli" },
  { service: "logger", path: "env/.env.logger" }
];

function main() {
  const failures: string[] = [];

  for (const template of TEMPLATES) {
    const values = loadEnvFile(path.resolve(process.cwd(), template.path), {});
    const missing = getMissingEnvVars(template.service, values);
    if (missing.length) {
      failures.push(`${template.service} (${template.path}): missing ${missing.join(", ")}`);
    }
  }

  if (failures.length) {
    console.error("Environment template validation failed:\n");
    failures.forEach(failure => console.error(` • ${failure}`));
    process.exitCode = 1;
    return;
  }

  console.log("All environment templates satisfy the schema:", TEMPLATES.map(t => t.service).join(", "));
}

main();
