/**
 * friends.ts
 *
 * How another profile relates to the signed-in user. Friendship is a
 * friend request that has been accepted, in either direction.
 */

import type {FriendRequest} from "./types.js";

export type Relation =
    | {kind: "self"}
    | {kind: "friend"}
    | {kind: "sent"}
    | {kind: "received"; requestId: number}
    | {kind: "none"};

export type FriendState = {
    friendIds: ReadonlySet<number>;
    // Users the viewer has sent a request to, accepted or not
    sentToIds: ReadonlySet<number>;
    // Pending incoming requests, keyed by sender
    receivedFrom: ReadonlyMap<number, number>;
};

export function friendIdsOf(userId: number, requests: readonly FriendRequest[]): Set<number> {
    const ids = new Set<number>();
    for (const r of requests) {
        if (!r.accepted) continue;
        if (r.fromUserId === userId) ids.add(r.toUserId);
        else if (r.toUserId === userId) ids.add(r.fromUserId);
    }
    return ids;
}

/**
 * Split every request touching `userId` into friends, sent and pending
 * received.
 */
export function friendStateOf(userId: number, requests: readonly FriendRequest[]): FriendState {
    const sentToIds = new Set<number>();
    const receivedFrom = new Map<number, number>();
    for (const r of requests) {
        if (r.fromUserId === userId) sentToIds.add(r.toUserId);
        else if (r.toUserId === userId && !r.accepted) receivedFrom.set(r.fromUserId, r.id);
    }
    return {friendIds: friendIdsOf(userId, requests), sentToIds, receivedFrom};
}

export function relationTo(viewerId: number, otherId: number, state: FriendState): Relation {
    if (viewerId === otherId) return {kind: "self"};
    if (state.friendIds.has(otherId)) return {kind: "friend"};
    const requestId = state.receivedFrom.get(otherId);
    if (requestId !== undefined) return {kind: "received", requestId};
    if (state.sentToIds.has(otherId)) return {kind: "sent"};
    return {kind: "none"};
}
