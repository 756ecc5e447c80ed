/**
 * Small builders for league pages used across the tests
 */

export interface TableFixture {
    headerRows: string[][];
    rows: string[][];
}

function cells(tag: 'th' | 'td', values: string[]): string {
    return values.map(value => `<${tag}>${value}</${tag}>`).join('');
}

export function tableHtml(table: TableFixture): string {
    const head = table.headerRows.map(row => `<tr>${cells('th', row)}</tr>`).join('\n');
    const body = table.rows.map(row => `<tr>${cells('td', row)}</tr>`).join('\n');
    return `<table>\n<thead>\n${head}\n</thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}

export function pageHtml(tables: string[], title = 'League Stats'): string {
    return `<!DOCTYPE html><html><head><title>${title}</title></head><body>\n${tables.join('\n')}\n</body></html>`;
}

export const STANDINGS_TABLE: TableFixture = {
    headerRows: [['Squad', 'MP', 'GF', 'GA', 'Pts']],
    rows: [
        ['Arsenal', '38', '91', '29', '89'],
        ['Chelsea', '38', '77', '63', '63'],
    ],
};

export const SCORERS_TABLE: TableFixture = {
    headerRows: [['Squad', 'MP', 'Top Team Scorer']],
    rows: [
        ['Arsenal', '38', 'Bukayo Saka - 16'],
        ['Chelsea', '38', 'Vacant'],
    ],
};

export const OTHER_TABLE: TableFixture = {
    headerRows: [['Notes']],
    rows: [['Season in progress']],
};
