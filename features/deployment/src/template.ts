/**
 * nginx template rendering
 *
 * envsubst semantics limited to the known parameters: `${NAME}` and `$NAME`
 * are substituted, lowercase nginx variables such as `$host` pass through.
 * An unknown `${NAME}` or an unterminated `${` is a TemplateError.
 */

import { TemplateError } from '@bgctl/shared';

export const TEMPLATE_PARAMETERS = ['NGINX_PORT', 'ACTIVE_POOL', 'BACKUP_POOL', 'APP_INTERNAL_PORT'] as const;

export type TemplateParameter = (typeof TEMPLATE_PARAMETERS)[number];

export type TemplateParams = Record<TemplateParameter, string>;

export function isTemplateParameter(name: string): name is TemplateParameter {
  return TEMPLATE_PARAMETERS.some((parameter) => parameter === name);
}

export function renderProxyTemplate(template: string, params: TemplateParams): string {
  if (template.trim() === '') {
    throw new TemplateError('Proxy template is empty');
  }

  const lines = template.split('\n');
  const badLine = lines.findIndex((line) => /\$\{(?![^}]*\})/.test(line));
  if (badLine !== -1) {
    throw new TemplateError(`Unterminated \${ on template line ${badLine + 1}`, { line: badLine + 1 });
  }

  for (const name of TEMPLATE_PARAMETERS) {
    if (params[name] === '') {
      throw new TemplateError(`Missing template parameter: ${name}`, { parameter: name });
    }
  }

  return template.replace(
    /\$\{([^}]*)\}|\$([A-Z_][A-Z0-9_]*)/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      if (braced !== undefined) {
        if (!isTemplateParameter(braced)) {
          throw new TemplateError(`Unknown template parameter \${${braced}}`, { parameter: braced });
        }
        return params[braced];
      }
      if (bare !== undefined && isTemplateParameter(bare)) {
        return params[bare];
      }
      return match;
    },
  );
}
