import { mkdirSync, writeFileSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';

import { buildCFunctionInfo } from './codegen/fastPath.js';
import { loadOptionalConfig } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { traceInfo } from './dx/trace.js';
import { renderBindingModule } from './emit/renderModule.js';
import { renderCPrototype } from './ffi/abiTypes.js';
import { parseDeclarationFile } from './parser/index.js';
import { buildPlan } from './plan/buildPlan.js';
import type { GenerationPlan } from './plan/planTypes.js';
import { formatSignature } from './signature/describeFunction.js';
import { ConfigurationError } from './signature/signatureTypes.js';
import { formatTypeDesc } from './signature/typeDesc.js';

export type CliIO = {
  log(line: string): void;
  error(line: string): void;
  cwd: string;
};

export function getFlagValue(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function usage(): string {
  return `enginebind

Usage:
	enginebind plan <file.rs>
	enginebind gen <file.rs> [--out <file>] [--impl <module>]

Examples:
	enginebind plan native/math.rs
	enginebind gen native/math.rs --impl ./math.impl.js --out src/generated/math.bindings.ts

Notes:
	- Only functions annotated with #[method] / #[method(...)] are bound
	- Defaults for --impl and --out can be set in enginebind.config.js (implModule, outFile)
	- Set ENGINEBIND_DEBUG=1 for debug logs, ENGINEBIND_TRACE=1 for JSON trace events
`;
}

export function fmtOk(msg: string) {
  return `✓ ${msg}`;
}

export function fmtFail(msg: string) {
  return `✗ ${msg}`;
}

function describePlan(plan: GenerationPlan): string[] {
  const lines = [fmtOk(formatSignature(plan.signature))];
  if (plan.jsName !== plan.signature.name) lines.push(`  name: ${plan.jsName}`);
  lines.push(`  call: ${plan.callMode}`);

  const { verdict } = plan;
  if (verdict.kind === 'dual-path') {
    const info = buildCFunctionInfo(verdict.fast, plan.state);
    lines.push(`  path: dual-path (${renderCPrototype(plan.names.fast, info)})`);
  } else {
    lines.push(`  path: slow-only${verdict.fallback ? ` (${verdict.fallback.reason})` : ''}`);
  }

  if (plan.state) {
    lines.push(`  state: ${plan.state.mode} ${formatTypeDesc(plan.state.declared)}`);
  }
  return lines;
}

/** Plans every declaration; configuration errors are reported per function. */
function planAll(file: string, io: CliIO): { plans: GenerationPlan[]; failed: boolean } {
  const plans: GenerationPlan[] = [];
  let failed = false;
  for (const sig of parseDeclarationFile(file)) {
    try {
      plans.push(buildPlan(sig));
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      io.error(fmtFail(`${sig.name}: ${err.message}`));
      failed = true;
    }
  }
  return { plans, failed };
}

/**
 * Runs one CLI invocation. `argv` excludes the node binary and script.
 * Returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const [cmd, arg] = argv;

  if (!cmd || cmd === '-h' || cmd === '--help') {
    io.log(usage());
    return 0;
  }

  if (cmd !== 'plan' && cmd !== 'gen') {
    io.error(`Unknown command: ${cmd}`);
    io.log(usage());
    return 1;
  }

  if (!arg) {
    io.error('Missing declaration file (ex: native/math.rs)');
    io.log(usage());
    return 1;
  }

  try {
    const config = await loadOptionalConfig(io.cwd);
    if (config?.debug) setDebugEnabled(true);

    const file = resolve(io.cwd, arg);
    traceInfo('cli.start', { cmd, file });
    const { plans, failed } = planAll(file, io);

    if (cmd === 'plan') {
      if (!plans.length && !failed) io.log('No #[method] declarations found');
      for (const plan of plans) io.log(describePlan(plan).join('\n'));
      return failed ? 1 : 0;
    }

    if (failed) return 1;
    const source = renderBindingModule(plans, {
      implModule: getFlagValue(argv, '--impl') ?? config?.implModule ?? './impl.js',
      runtimeModule: config?.runtimeModule,
      source: basename(file),
    });

    const out = getFlagValue(argv, '--out') ?? config?.outFile;
    if (!out) {
      io.log(source);
      return 0;
    }
    const outPath = resolve(io.cwd, out);
    mkdirSync(dirname(outPath), { recursive: true });
    writeFileSync(outPath, source, 'utf8');
    io.log(fmtOk(`Wrote ${plans.length} binding(s) to ${outPath}`));
    return 0;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      io.error(fmtFail(err.message));
      return 1;
    }
    throw err;
  }
}
