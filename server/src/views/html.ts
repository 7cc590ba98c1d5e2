/**
 * html.ts
 *
 * Tagged template for server-rendered markup. Interpolated values are
 * HTML-escaped unless they are `Html` fragments themselves, so templates can
 * be nested freely while user data never reaches the page unescaped.
 */

export class Html {
    constructor(readonly value: string) {
    }

    toString() {
        return this.value;
    }
}

export type HtmlValue = Html | string | number | boolean | null | undefined | readonly HtmlValue[];

const ESCAPES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#39;",
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (c) => ESCAPES[c] ?? c);
}

function renderValue(value: HtmlValue): string {
    if (value instanceof Html) return value.value;
    if (Array.isArray(value)) return value.map(renderValue).join("");
    // false/null/undefined render nothing so `${cond && html`...`}` works
    if (value === null || value === undefined || value === false) return "";
    return escapeHtml(String(value));
}

export function html(strings: TemplateStringsArray, ...values: HtmlValue[]): Html {
    let out = strings[0] ?? "";
    values.forEach((v, i) => {
        out += renderValue(v) + (strings[i + 1] ?? "");
    });
    return new Html(out);
}

/**
 * Trusted markup that must not be escaped.
 */
export function raw(markup: string): Html {
    return new Html(markup);
}

/**
 * JSON for an inline `<script>`; `<` is escaped so the payload cannot close
 * the script element.
 */
export function inlineJson(value: unknown): Html {
    return raw(JSON.stringify(value).replace(/</g, "\\u003c"));
}
