#!/usr/bin/env node
import { Command } from "commander";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join, resolve, dirname } from "node:path";
import type { DriveSummary } from "../types";
import { load_script, run_script } from "./run";

type CliOptions = {
  pretty?: string | boolean;
  minify?: boolean;
  out?: string;
};

/** --minify 优先；--pretty 不带值为 2 格，非法值回落到 2 */
function indent_of(opt: CliOptions): number {
  if (opt.minify || opt.pretty === false) return 0;
  if (opt.pretty === true || opt.pretty === undefined) return 2;
  const n = Number(opt.pretty);
  return Number.isInteger(n) && n >= 0 ? n : 2;
}

/** 把运行摘要写到脚本旁边，返回写入的绝对路径 */
async function write_summary(dir: string, filename: string, summary: DriveSummary<unknown, unknown>, indent: number): Promise<string> {
  const target = join(dir, filename);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify(summary, null, indent)}\n`, "utf8");
  return target;
}

function error_code(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

const program = new Command();

program
  .name("turnloop")
  .description("Run a scripted session of a sample turn-based game")
  .version("0.1.0")
  .argument("<script>", "path to a JSON input script")
  .option("--pretty [n]", "pretty-print JSON with n spaces (default: 2)", false)
  .option("--minify", "minify JSON (overrides --pretty)", false)
  .option("-o, --out <file>", "output file name beside the script (default: run.out.json)")
  .action(async (script_path: string, opts: CliOptions) => {
    const indent = indent_of(opts);
    const target_path = resolve(script_path);
    try {
      const text = await readFile(target_path, "utf8");
      console.log(`Reading script: ${target_path}`);

      /***
       * 步骤: Validate
       * *****
       */
      const loaded = load_script(text);
      if (!loaded.ok) {
        console.error(`❌ Invalid script with ${loaded.errors.length} error(s):`);
        for (const e of loaded.errors) {
          console.error(`  - [${e.code}] ${e.path} : ${e.message}`);
        }
        process.exitCode = 1;
        return;
      }

      /***
       * 步骤: Drive
       * *****
       */
      const summary = run_script(loaded.script, (event, turn) => {
        console.log(`[turn ${turn}] ${JSON.stringify(event)}`);
      });

      if (summary.ok) {
        console.log(`✅ Outcome: ${JSON.stringify(summary.outcome)}`);
      } else {
        console.error(`❌ Run stopped: [${summary.error?.code}] ${summary.error?.message}`);
        process.exitCode = 1;
      }

      const written = await write_summary(dirname(target_path), opts.out ?? "run.out.json", summary, indent);
      console.log(`Summary written to: ${written}`);
    } catch (err: unknown) {
      if (error_code(err) === "ENOENT") {
        console.error(`❌ Not found: ${target_path}`);
      } else {
        console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
