/**
 * pages.ts
 *
 * Shared helpers of the server-rendered pages: wrap a body in the layout,
 * count the render and send it as HTML.
 */

import type {FastifyReply, FastifyRequest} from "fastify";
import {ZodError} from "zod";
import {csrfTokenFor} from "../auth/csrf.js";
import {getConfig} from "../config.js";
import {pageRenderCounter} from "../observability/metrics.js";
import type {Html} from "../views/html.js";
import {renderLayout} from "../views/layout.js";

export type PageOptions = {
    // Metric label, e.g. "home"
    page: string;
    title: string;
    body: Html;
    scripts?: string[];
    status?: number;
};

export function sendPage(req: FastifyRequest, reply: FastifyReply, opts: PageOptions) {
    pageRenderCounter.inc({page: opts.page});
    const user = req.user;
    const markup = renderLayout({
        title: opts.title,
        user,
        gitHash: getConfig().GIT_HASH,
        csrfToken: user ? csrfTokenFor(user.id) : undefined,
        scripts: opts.scripts,
        body: opts.body,
    });
    return reply.code(opts.status ?? 200).type("text/html; charset=utf-8").send(markup);
}

export function isXhr(req: FastifyRequest): boolean {
    return req.headers["x-requested-with"] === "XMLHttpRequest";
}

/**
 * Flatten zod issues into form error lines (`field: message`).
 */
export function zodMessages(err: ZodError): string[] {
    return err.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}

export function errorCode(err: unknown): string | null {
    return err instanceof Error ? err.message : null;
}

/**
 * Keep the submitted string fields so the form can be re-rendered with them.
 */
export function formValues(body: unknown): Record<string, string> {
    const out: Record<string, string> = {};
    if (typeof body !== "object" || body === null) return out;
    for (const [key, value] of Object.entries(body)) {
        if (typeof value === "string") out[key] = value;
    }
    return out;
}
