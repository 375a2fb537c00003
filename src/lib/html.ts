// Telegram's HTML parse mode only recognises these entities.
const ENTITIES: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", "\"": "&quot;" };

export function escapeHtml(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).replace(/[&<>"]/g, (c) => ENTITIES[c] ?? c);
}

/** Already-rendered markup; `html` inserts it as is. */
export class Markup {
  constructor(readonly value: string) {}
  toString() {
    return this.value;
  }
}

export function link(href: string, label: string): Markup {
  return new Markup(`<a href="${escapeHtml(href)}">${escapeHtml(label)}</a>`);
}

// Tagged template: interpolations are escaped unless they are Markup.
export function html(strings: TemplateStringsArray, ...values: unknown[]): string {
  let out = strings[0];
  values.forEach((v, i) => {
    out += v instanceof Markup ? v.value : escapeHtml(v);
    out += strings[i + 1];
  });
  return out;
}
