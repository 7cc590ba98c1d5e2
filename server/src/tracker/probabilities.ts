/**
 * probabilities.ts
 *
 * Sanity check of stored rarity probabilities: within one pack type every
 * active slot must sum to 1 across all rarities. God pack types are skipped
 * since their probabilities are derived at read time.
 */

import {isGodPack} from "./odds.js";
import type {PackType, RarityProbability} from "./types.js";

export const SUM_EPSILON = 1e-5;

export type SlotSumCheck = {
    generation: string;
    packType: string;
    // 1-based slot number
    slot: number;
    sum: number;
    ok: boolean;
};

/**
 * Sum every active slot of every non-god pack type. Pack types without any
 * probability rows are not checked.
 */
export function checkProbabilitySums(
    packTypes: PackType[],
    rows: RarityProbability[],
    epsilon = SUM_EPSILON,
): SlotSumCheck[] {
    const checks: SlotSumCheck[] = [];
    const ordered = [...packTypes].sort((a, b) =>
        a.generation.localeCompare(b.generation) || a.name.localeCompare(b.name));

    for (const packType of ordered) {
        if (isGodPack(packType)) continue;
        const own = rows.filter((r) => r.packTypeId === packType.id);
        if (own.length === 0) continue;

        for (let slot = 0; slot < packType.slotCount; slot++) {
            const sum = own.reduce((acc, r) => acc + (r.slots[slot] ?? 0), 0);
            checks.push({
                generation: packType.generation,
                packType: packType.name,
                slot: slot + 1,
                sum,
                ok: Math.abs(sum - 1) <= epsilon,
            });
        }
    }
    return checks;
}

/**
 * Only the failing checks.
 */
export function validateProbabilitySums(
    rows: RarityProbability[],
    packTypes: PackType[],
    epsilon = SUM_EPSILON,
): SlotSumCheck[] {
    return checkProbabilitySums(packTypes, rows, epsilon).filter((c) => !c.ok);
}

export function formatCheck(check: SlotSumCheck): string {
    const status = check.ok ? "OK" : "(!= 1.0)";
    return `${check.generation} - ${check.packType} slot ${check.slot} sum=${check.sum.toFixed(6)} ${status}`;
}

export type ReportLine = {
    level: "info" | "error";
    text: string;
};

export type ValidationReport = {
    lines: ReportLine[];
    errors: number;
};

/**
 * Console report of the checks: failures always, passing slots only with
 * `showAll`. `failFast` stops after the first failure.
 */
export function reportChecks(checks: SlotSumCheck[], opts: {failFast?: boolean; showAll?: boolean} = {}): ValidationReport {
    const lines: ReportLine[] = [];
    let errors = 0;
    for (const check of checks) {
        if (!check.ok) {
            errors++;
            lines.push({level: "error", text: formatCheck(check)});
            if (opts.failFast) break;
        } else if (opts.showAll) {
            lines.push({level: "info", text: formatCheck(check)});
        }
    }
    lines.push(errors > 0
        ? {level: "error", text: `Validation FAILED: ${errors} issue(s).`}
        : {level: "info", text: "All rarity probability slot sums valid."});
    return {lines, errors};
}
