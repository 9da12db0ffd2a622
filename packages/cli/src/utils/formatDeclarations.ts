/**
 * Text rendering of synthesis output for the terminal.
 */

import type { DeclarationSet, ObjectBindingDeclaration, ParameterSpec } from '@handlerkit/types';

export type OutputFormat = 'summary' | 'json';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'summary' || value === 'json';
}

/** `dt: number, scale: number` */
export function formatParams(params: readonly ParameterSpec[]): string {
  return params.map((p) => `${p.name}: ${p.type}`).join(', ');
}

/**
 * Human-readable outline of a declaration set.
 *
 * @example
 * System World (sha256:…)
 *
 * Handler interfaces:
 *   Drawable
 *     draw()
 */
export function formatSummary(declarations: DeclarationSet): string {
  const lines: string[] = [];
  const capability = declarations.capabilityInterface;
  const registry = declarations.registry;

  lines.push(`System ${declarations.system} (${declarations.checksum})`);
  lines.push('');

  lines.push('Handler interfaces:');
  if (declarations.handlerInterfaces.length === 0) {
    lines.push('  (none)');
  }
  for (const handler of declarations.handlerInterfaces) {
    lines.push(`  ${handler.name}`);
    for (const method of handler.methods) {
      lines.push(`    ${method.name}(${formatParams(method.params)})`);
    }
  }
  lines.push('');

  const extendsClause = capability.extends.length > 0 ? ` extends ${capability.extends.join(', ')}` : '';
  lines.push(`Capability interface ${capability.name}${extendsClause}`);
  for (const accessor of capability.accessors) {
    lines.push(`  ${accessor.name}() -> ${accessor.handler} (${accessor.mode})`);
  }
  lines.push('');

  lines.push(`Registry ${registry.name}`);
  for (const field of registry.fields) {
    const type = field.kind === 'objects' ? `${field.elementType}[]` : 'number[]';
    lines.push(`  ${field.name}: ${type}`);
  }
  for (const method of registry.methods) {
    if (method.kind === 'builtin') {
      lines.push(`  ${method.name}()`);
    } else {
      lines.push(
        `  ${method.name}(${formatParams(method.params)}) -> ${method.handler}.${method.target} via ${method.cache}`
      );
    }
  }

  return lines.join('\n');
}

/**
 * One line per accessor, present ones marked.
 */
export function formatBindingSummary(binding: ObjectBindingDeclaration): string {
  const lines = [`${binding.typeName} implements ${binding.implemented.join(', ') || '(nothing)'}`];
  for (const accessor of binding.accessors) {
    lines.push(`  ${accessor.present ? '+' : '-'} ${accessor.name}()`);
  }
  return lines.join('\n');
}
