import type { Console } from "../Console.ts";
import type { Disk } from "../Disk.ts";
import type { RandomNumbers } from "../RandomNumbers.ts";
import type { Runtime } from "../Runtime.ts";

export interface ExecutionContext {
  runtime: Runtime;
  console: Console;
  disk: Disk;
  random: RandomNumbers;
  now: () => Date;
  environment: Map<string, string>;
}
