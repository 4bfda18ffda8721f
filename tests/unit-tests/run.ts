import "../db-tests/_utils/setup";
import { runSuiteFiles } from "../db-tests/_utils/load";

await runSuiteFiles(import.meta.url, ".unit.test.ts", "World Unit Summary");
