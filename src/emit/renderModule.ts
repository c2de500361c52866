import { buildCFunctionInfo } from '../codegen/fastPath.js';
import { renderCPrototype } from '../ffi/abiTypes.js';
import type { GenerationPlan } from '../plan/planTypes.js';
import { formatSignature } from '../signature/describeFunction.js';

export type RenderOptions = {
  /** Module the implementations are imported from, as a namespace. */
  implModule: string;
  /** Defaults to `enginebind`. */
  runtimeModule?: string;
  /** Declaration file name, for the header line. */
  source?: string;
};

function fallbackNote(plan: GenerationPlan): string | undefined {
  const { verdict } = plan;
  if (verdict.kind === 'dual-path') return undefined;
  const why = verdict.fallback ? verdict.fallback.reason : 'fast path not requested';
  return `// ${plan.signature.name}: slow path only (${why})`;
}

function renderPlan(plan: GenerationPlan): string[] {
  const { names, signature } = plan;
  const base = names.callback.slice(0, -'Callback'.length);
  const sigConst = `${base}Signature`;
  const bundleConst = `${base}Bindings`;

  const lines: string[] = [
    `/** ${formatSignature(signature)} */`,
    `const ${sigConst}: FunctionSignature = ${JSON.stringify(signature, null, 2)};`,
    `const ${bundleConst} = emitBindings(${sigConst}, impl.${signature.name});`,
    '',
    `export const ${names.callback} = ${bundleConst}.callback;`,
  ];

  const { verdict } = plan;
  if (verdict.kind === 'dual-path') {
    const info = buildCFunctionInfo(verdict.fast, plan.state);
    lines.push(
      `/** ${renderCPrototype(names.fast, info)} */`,
      `export const ${names.fast} = requireFastPath(${bundleConst}).fn;`,
      `export const ${names.cfunctionInfo} = requireFastPath(${bundleConst}).info;`,
      `export const ${names.cfunction} = requireFastPath(${bundleConst}).cfunction;`,
    );
  } else {
    const note = fallbackNote(plan);
    if (note) lines.push(note);
  }

  const registration = plan.state?.mode === 'pinned-capsule' ? 'pinnedRegistration' : 'plainRegistration';
  lines.push(`export const ${names.template} = ${registration}(${bundleConst});`);
  return lines;
}

/**
 * Renders plans as a TypeScript module that builds the bindings at load
 * time and exports each artifact under its own name.
 */
export function renderBindingModule(
  plans: readonly GenerationPlan[],
  options: RenderOptions,
): string {
  const runtime = options.runtimeModule ?? 'enginebind';
  const needsPinned = plans.some((p) => p.state?.mode === 'pinned-capsule');
  const needsPlain = plans.some((p) => p.state?.mode !== 'pinned-capsule');
  const needsFast = plans.some((p) => p.verdict.kind === 'dual-path');

  const imported = [
    'emitBindings',
    ...(needsPinned ? ['pinnedRegistration'] : []),
    ...(needsPlain ? ['plainRegistration'] : []),
    ...(needsFast ? ['requireFastPath'] : []),
    'type FunctionSignature',
  ];

  const header = options.source
    ? `// Generated by enginebind from ${options.source}. Do not edit.`
    : '// Generated by enginebind. Do not edit.';

  const out: string[] = [
    header,
    `import {\n${imported.map((n) => `  ${n},`).join('\n')}\n} from '${runtime}';`,
    `import * as impl from '${options.implModule}';`,
  ];
  for (const plan of plans) {
    out.push('', ...renderPlan(plan));
  }
  return `${out.join('\n')}\n`;
}
