import { pathToFileURL } from 'url';

import chalk from 'chalk';
import { formatDate } from 'date-fns';
import _ from 'lodash';

export async function createScript(fn: () => Promise<void> | void) {
    process.on('unhandledRejection', err => {
        console.error(chalk.red.bold('[Unhandled promise rejection]'), err);
    });

    await new Promise(resolve => setTimeout(resolve, 1)); // lets the script module finish evaluating before fn runs

    try {
        await fn();
        process.exit(0);
    } catch (err) {
        console.error(chalk.red.bold('[Error]'), err instanceof Error ? err.message : err);
        if (err instanceof Error && err.cause !== undefined) {
            console.error(chalk.red.bold('error.cause ='), err.cause);
        }
        process.exit(1);
    }
}

/** Node has no `import.meta.main`; a module is the entry point when it is the file node was started with. */
export function isMainModule(moduleUrl: string): boolean {
    const entry = process.argv[1];
    return entry !== undefined && pathToFileURL(entry).href === moduleUrl;
}

let groupLevel = (() => {
    const old = {
        group: console.group.bind(console),
        groupEnd: console.groupEnd.bind(console),
    };
    console.group = (...args: unknown[]) => {
        groupLevel++;
        return old.group(...args);
    };
    console.groupEnd = () => {
        groupLevel--;
        return old.groupEnd();
    };
    return 0;
})();

const isEmpty = (t: unknown) => t == null || t === '';

const trunc = (n: number, s: string) => _.truncate(s, { length: n, omission: '…' });

export const style = {
    header: (title: string) =>
        chalk.bgBlue.white.bold(
            ` ⬥ ${title}`.padEnd((process.stdout.columns ?? 80) - groupLevel * 2),
        ),
    number: (value: number | null | undefined, label: string) =>
        isEmpty(value) ? '' : style.label(label, chalk.yellow(_.round(value ?? 0, 2))),
    label: (label: string, value: unknown) =>
        isEmpty(value)
            ? ''
            : chalk.bold(label + ': ') +
              (value && typeof value === 'object' ? trunc(30, JSON.stringify(value)) : String(value)),
};

export function logStep(step: string, ...details: string[]) {
    console.info(
        chalk.gray(`[${formatDate(new Date(), 'HH:mm:ss')}]`),
        chalk.bold(step + ':'),
        ...details.map(detail => chalk.green(detail)),
    );
}

export function getTimer() {
    const start = Date.now();
    return (log?: string) => {
        const durationInSeconds = _.round((Date.now() - start) / 1000, 1);
        if (log) console.info(style.label('⏱︎ ' + log, chalk.yellow(durationInSeconds + 's')));
        return durationInSeconds;
    };
}
