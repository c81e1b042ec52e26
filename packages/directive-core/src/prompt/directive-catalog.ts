/**
 * Directive Catalog
 *
 * Renders the registered directives as a system-prompt section so the model
 * knows which tags exist and where each parameter goes.
 */

import type { ParamBinding, ToolSchema } from '@tagwire/directive-contracts';

export interface CatalogOptions {
  heading?: string;
  /** Include an example per directive (schema example, else one built from the bindings) */
  includeExamples?: boolean;
}

const PLACEHOLDER: Record<ParamBinding['valueType'], string> = {
  string: '...',
  integer: '1',
  boolean: 'true',
  list: '- item',
};

function describeBinding(binding: ParamBinding): string {
  const where =
    binding.source === 'content'
      ? 'body'
      : binding.source === 'attribute'
        ? `attribute "${binding.path}"`
        : `child element <${binding.path.replace(/\//g, '.')}>`;
  const flags = [binding.valueType, binding.required ? 'required' : 'optional'];
  if (binding.default !== undefined) {
    flags.push(`default ${JSON.stringify(binding.default)}`);
  }
  const description = binding.description ? `: ${binding.description}` : '';
  return `- \`${binding.name}\` (${where}, ${flags.join(', ')})${description}`;
}

function openElements(path: string): { open: string; close: string } {
  const segments = path.split(/[./]/);
  return {
    open: segments.map(s => `<${s}>`).join(''),
    close: [...segments].reverse().map(s => `</${s}>`).join(''),
  };
}

/**
 * Build an example directive from a schema's bindings.
 */
export function exampleFor(schema: ToolSchema): string {
  const attributes = schema.bindings
    .filter(b => b.source === 'attribute')
    .map(b => ` ${b.path}="${PLACEHOLDER[b.valueType]}"`)
    .join('');
  const content = schema.bindings.find(b => b.source === 'content');
  const elements = schema.bindings.filter(b => b.source === 'element');

  if (!content && elements.length === 0) {
    return `<${schema.tag}${attributes} />`;
  }

  const lines = elements.map(b => {
    const { open, close } = openElements(b.path);
    return b.valueType === 'list'
      ? `${open}\n${PLACEHOLDER.list}\n${close}`
      : `${open}${PLACEHOLDER[b.valueType]}${close}`;
  });
  if (content) {
    lines.push(PLACEHOLDER[content.valueType]);
  }

  return `<${schema.tag}${attributes}>\n${lines.join('\n')}\n</${schema.tag}>`;
}

export class DirectiveCatalogBuilder {
  build(schemas: readonly ToolSchema[], options: CatalogOptions = {}): string {
    const includeExamples = options.includeExamples ?? true;
    let prompt = `# ${options.heading ?? 'Available Directives'}\n\n`;
    prompt +=
      'Invoke a tool by writing its directive anywhere in your reply. ' +
      'Directives run in the order written; each result comes back as a <tool_result> message.\n';

    for (const schema of schemas) {
      prompt += `\n## ${schema.tag}\n`;
      if (schema.description) {
        prompt += `${schema.description}\n`;
      }
      if (schema.bindings.length > 0) {
        prompt += `Parameters:\n${schema.bindings.map(describeBinding).join('\n')}\n`;
      }
      if (includeExamples) {
        prompt += `Example:\n\`\`\`xml\n${schema.example ?? exampleFor(schema)}\n\`\`\`\n`;
      }
    }

    return prompt;
  }
}
