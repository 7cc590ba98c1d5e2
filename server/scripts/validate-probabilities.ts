/**
 * validate-probabilities.ts
 *
 * Checks that every active slot of every non-god pack type sums to 1 across
 * its rarities. Exits with code 1 when any slot is off.
 *
 * Usage: `npm run validate:probabilities -- [--fail-fast] [--show-all]`
 */

import {parseValidateOptions} from '../src/cli/validateProbabilities.js';
import {getConfig, loadDotEnv} from '../src/config.js';
import {closePool} from '../src/db/pg.js';
import * as log from '../src/logging.js';
import {listPackTypes, listRarityProbabilities} from '../src/repositories/probabilities.js';
import {checkProbabilitySums, reportChecks} from '../src/tracker/probabilities.js';

async function run(): Promise<number> {
    const options = parseValidateOptions(process.argv.slice(2));
    loadDotEnv();
    getConfig();

    const [packTypes, rows] = await Promise.all([listPackTypes(), listRarityProbabilities()]);
    const report = reportChecks(checkProbabilitySums(packTypes, rows), options);
    for (const line of report.lines) {
        if (line.level === 'error') log.error(line.text);
        else log.info(line.text);
    }
    return report.errors > 0 ? 1 : 0;
}

run()
    .then(async (code) => {
        await closePool();
        process.exit(code);
    })
    .catch(async (e: unknown) => {
        log.error('probability validation failed', e);
        await closePool();
        process.exit(1);
    });
