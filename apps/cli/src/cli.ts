import { runProgram } from "./program.ts";

const code = await runProgram(process.argv);
if (code !== 0) {
  process.exit(code);
}
