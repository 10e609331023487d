import { JSDOM } from 'jsdom';

/**
 * Cell texts of every data row under `tableSelector`, in document order.
 * Header rows (no `<td>`) are left out. Returns null when the selector
 * matches nothing.
 */
export function readTableRows(html: string, tableSelector: string): string[][] | null {
    const { document } = new JSDOM(html).window;
    const table = document.querySelector(tableSelector);
    if (!table) return null;

    return Array.from(table.querySelectorAll('tr'))
        .map(row => Array.from(row.querySelectorAll('td')).map(cell => cell.textContent ?? ''))
        .filter(cells => cells.length > 0);
}
