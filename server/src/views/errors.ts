import {html, type Html} from "./html.js";

export function renderNotFound(what = "Page"): Html {
    return html`<h1>${what} not found</h1>
<p><a href="/">Back to the overview</a></p>`;
}

export function renderServerError(): Html {
    return html`<h1>Something went wrong</h1>
<p>The error has been logged. Please try again later.</p>`;
}
