import "./_utils/setup";
import { getNamespace } from "./_utils/env";
import { runSuiteFiles } from "./_utils/load";

console.log(`World tests on the in-memory store (namespace='${getNamespace()}')`);
await runSuiteFiles(import.meta.url, ".int.test.ts", "World Integration Summary");
