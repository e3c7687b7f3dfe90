/**
 * Handlebars compilation for prompt templates.
 */

import Handlebars from 'handlebars';

import { PromptTemplateError } from './errors';

// Separate instance so our helpers never leak into the global Handlebars.
const handlebars = Handlebars.create();

handlebars.registerHelper('join', (items: unknown, separator: unknown) => {
  if (!Array.isArray(items)) {
    return '';
  }
  return items.map(String).join(typeof separator === 'string' ? separator : ', ');
});

handlebars.registerHelper('orNone', (value: unknown) => {
  if (value === null || value === undefined || value === '') {
    return 'none';
  }
  return String(value);
});

function wrapTemplateError(promptId: string, error: unknown): PromptTemplateError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new PromptTemplateError(promptId, message, { cause });
}

/**
 * Compiles a Handlebars template into a render function. Strict mode: a
 * field missing from the input is an error, not an empty string.
 *
 * @throws {PromptTemplateError} If compilation or rendering fails
 *
 * @example
 * ```typescript
 * const render = compileTemplate<{ name: string }>('Hello, {{name}}!', 'greeting');
 * render({ name: 'World' }); // => 'Hello, World!'
 * ```
 */
export function compileTemplate<TInput>(template: string, promptId: string): (input: TInput) => string {
  try {
    const compiled = handlebars.compile(template, {
      strict: true,
      noEscape: true,
    });

    return (input: TInput): string => {
      try {
        return compiled(input);
      } catch (error) {
        throw wrapTemplateError(promptId, error);
      }
    };
  } catch (error) {
    throw wrapTemplateError(promptId, error);
  }
}
