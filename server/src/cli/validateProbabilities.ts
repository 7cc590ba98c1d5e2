/**
 * validateProbabilities.ts
 *
 * Command-line options of `validate-probabilities`.
 */

import {Command} from 'commander';

export type ValidateOptions = {
    failFast: boolean;
    showAll: boolean;
};

export function createProgram(): Command {
    return new Command()
        .name('validate-probabilities')
        .description('Check that the rarity probabilities of every active pack slot sum to 1')
        .option('--fail-fast', 'stop at the first pack type with a failing slot', false)
        .option('--show-all', 'also print the slots that pass', false);
}

/**
 * Parse the arguments after the script name.
 */
export function parseValidateOptions(argv: readonly string[], program: Command = createProgram()): ValidateOptions {
    program.parse([...argv], {from: 'user'});
    const opts = program.opts<{failFast?: boolean; showAll?: boolean}>();
    return {failFast: opts.failFast === true, showAll: opts.showAll === true};
}
