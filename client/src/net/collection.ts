/**
 * collection.ts
 *
 * Network helpers of the set page: the collect/uncollect POST and the
 * rarity progress fragment. Both go to the page's own path.
 */

import {
    type CollectAction,
    type CollectResponse,
    RARITY_PROGRESS_FRAGMENT,
} from '../../../shared/types/collection.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

function isCollectResponse(value: unknown): value is CollectResponse {
    return typeof value === 'object' && value !== null
        && 'collected' in value && typeof value.collected === 'boolean';
}

/**
 * POST `card_id` and `action` as a form body. Resolves with the server's
 * answer; rejects on a non-2xx status or an unexpected body.
 */
export async function postCollect(
    fetchFn: FetchFn,
    path: string,
    cardId: string,
    action: CollectAction,
    csrfToken: string,
): Promise<CollectResponse> {
    const res = await fetchFn(path, {
        method: 'POST',
        credentials: 'same-origin',
        headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            'X-CSRF-Token': csrfToken,
            'X-Requested-With': 'XMLHttpRequest',
        },
        body: new URLSearchParams({card_id: cardId, action}).toString(),
    });
    if (!res.ok) throw new Error(`collect request failed with status ${res.status}`);
    const body: unknown = await res.json();
    if (!isCollectResponse(body)) throw new Error('unexpected collect response');
    return body;
}

/**
 * Inner HTML of `#rarity-progress` from a freshly rendered fragment, or
 * null when the response has no such element.
 */
export async function fetchRarityProgress(fetchFn: FetchFn, path: string): Promise<string | null> {
    const res = await fetchFn(`${path}?fragment=${RARITY_PROGRESS_FRAGMENT}`, {credentials: 'same-origin'});
    if (!res.ok) throw new Error(`progress request failed with status ${res.status}`);
    const doc = new DOMParser().parseFromString(await res.text(), 'text/html');
    return doc.getElementById('rarity-progress')?.innerHTML ?? null;
}
