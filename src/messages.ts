import { escapeMrkdwn } from "./slack.js";
import type { AssignmentAggregate, MessageTemplates } from "./types.js";

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

export type TemplateValues = Record<string, string | number>;

function formatValue(name: string, value: string | number, spec: string): string {
  if (spec === "") return String(value);
  const match = /^\.(\d+)([%f])$/.exec(spec);
  if (!match) throw new TemplateError(`Unsupported format "${spec}" for "${name}"`);
  if (typeof value !== "number") throw new TemplateError(`Placeholder "${name}" is not a number`);
  const digits = Number(match[1]);
  return match[2] === "%" ? `${(value * 100).toFixed(digits)}%` : value.toFixed(digits);
}

/**
 * Fills `{name}` and `{name:.2%}` / `{name:.1f}` placeholders. `{{` and `}}`
 * produce literal braces.
 */
export function formatTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{\{|\}\}|\{([^{}]*)\}|[{}]/g, (token: string, field: string | undefined) => {
    if (token === "{{") return "{";
    if (token === "}}") return "}";
    if (field === undefined) throw new TemplateError(`Single "${token}" in template`);
    const [name, ...rest] = field.split(":");
    const spec = rest.join(":");
    if (!Object.prototype.hasOwnProperty.call(values, name)) {
      throw new TemplateError(`Unknown placeholder "${name}"`);
    }
    return formatValue(name, values[name], spec);
  });
}

export function buildProgressMessage(
  templates: MessageTemplates,
  assignment: string,
  aggregate: Pick<AssignmentAggregate, "total" | "finalized" | "drafts" | "unclaimed">,
  gradersFinalized: readonly string[] = [],
): string {
  const { total, finalized, drafts, unclaimed } = aggregate;
  const lines = [
    formatTemplate(templates.notification, {
      assignment: escapeMrkdwn(assignment),
      done: total === 0 ? 0 : finalized / total,
      total,
      finalized,
      drafts,
      unclaimed,
    }),
  ];
  if (gradersFinalized.length > 0) {
    lines.push(
      formatTemplate(templates.recentGraders, {
        graders: gradersFinalized.map(escapeMrkdwn).join(", "),
        count: gradersFinalized.length,
      }),
    );
  }
  return lines.join("\n");
}

export function buildDeadlineMessage(templates: MessageTemplates, assignment: string, deadline: string): string {
  return formatTemplate(templates.deadline, {
    assignment: escapeMrkdwn(assignment),
    deadline: escapeMrkdwn(deadline),
  });
}
