/**
 * Prompt template utilities for consistent LLM interactions.
 */

export interface PromptTemplate {
  system?: string;
  template: string;
  variables: string[];
}

/**
 * Build a prompt by substituting variables into a template.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(variables)) {
    result = result.replace(new RegExp(`\\{${key}\\}`, 'g'), () => value);
  }
  return result;
}

/**
 * Create a reusable prompt template.
 */
export function createPromptTemplate(
  template: string,
  options?: { system?: string },
): PromptTemplate {
  const variableRegex = /\{(\w+)\}/g;
  const variables: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = variableRegex.exec(template)) !== null) {
    const name = match[1];
    if (name && !variables.includes(name)) {
      variables.push(name);
    }
  }

  return {
    system: options?.system,
    template,
    variables,
  };
}

/**
 * Execute a prompt template with given variables.
 */
export function executeTemplate(
  template: PromptTemplate,
  variables: Record<string, string>,
): { prompt: string; system?: string } {
  const missingVars = template.variables.filter((v) => !(v in variables));
  if (missingVars.length > 0) {
    throw new Error(`Missing template variables: ${missingVars.join(', ')}`);
  }

  return {
    prompt: buildPrompt(template.template, variables),
    system: template.system,
  };
}
