import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import type { QueryParams } from "../types/index.js";

// $$ | $name | ${name} | a lone $
const PLACEHOLDER_PATTERN =
  /\$(?:(\$)|([_a-zA-Z][_a-zA-Z0-9]*)|\{([_a-zA-Z][_a-zA-Z0-9]*)\}|())/g;

/**
 * Substitutes `$name` and `${name}` placeholders with values from `params`.
 * `$$` renders a literal `$`.
 *
 * @throws {RemoteResourceError} E_TEMPLATE when a placeholder has no value or a `$` is malformed
 */
export function renderTemplate(
  template: string,
  params: QueryParams,
  templateName = "template"
): string {
  return template.replace(
    PLACEHOLDER_PATTERN,
    (
      _match: string,
      escaped: string | undefined,
      named: string | undefined,
      braced: string | undefined,
      _invalid: string | undefined,
      offset: number
    ) => {
      if (escaped !== undefined) return "$";
      const name = named ?? braced;
      if (name === undefined) {
        throw new RemoteResourceError(
          `Invalid placeholder in '${templateName}' at offset ${offset}`,
          "E_TEMPLATE",
          { target: templateName, details: { offset } }
        );
      }
      if (!Object.prototype.hasOwnProperty.call(params, name)) {
        throw new RemoteResourceError(
          `Missing value for placeholder '$${name}' in '${templateName}'`,
          "E_TEMPLATE",
          { target: templateName, details: { placeholder: name } }
        );
      }
      return String(params[name]);
    }
  );
}

/**
 * Whether `template` references the placeholder `name` (either form).
 */
export function templateHasPlaceholder(template: string, name: string): boolean {
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (match[2] === name || match[3] === name) return true;
  }
  return false;
}
