import chalk from 'chalk';
import Table from 'cli-table3';

export function outputJSON(data: unknown) {
    console.log(JSON.stringify({ success: true, data }, null, 2));
}

export function outputTable(headers: string[], rows: string[][]) {
    const table = new Table({
        head: headers.map(h => chalk.cyan(h)),
        style: { head: [], border: [] }
    });
    table.push(...rows);
    console.log(table.toString());
}

export function outputKeyValue(key: string, value: string) {
    console.log(`${chalk.bold(key)}: ${value}`);
}
