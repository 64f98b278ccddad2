import { BoardGrid } from '../interface/sudoku.interface';

export interface PageData {
    source: string;
    error?: string;
    grid?: BoardGrid;
}

const STYLE = [
    'body { font-family: sans-serif; margin: 3em auto; max-width: 60em; }',
    '.columns { display: flex; gap: 3em; }',
    '.error { color: #a00; border: 1px solid #a00; padding: 0.5em 1em; }',
    'textarea { font-family: monospace; width: 22em; }',
    'table { border-collapse: collapse; }',
    'td { width: 1.6em; height: 1.6em; text-align: center; border: 1px solid #ccc; }',
    'td:nth-child(3), td:nth-child(6) { border-right: 2px solid #555; }',
    'tr:nth-child(3) td, tr:nth-child(6) td { border-bottom: 2px solid #555; }',
].join('\n');

export function escape_html(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

function render_grid(grid: BoardGrid): string {
    const rows = grid.map(row => `<tr>${row.map(value => `<td>${value === 0 ? '' : value}</td>`).join('')}</tr>`);

    return `<table class="solution">\n${rows.join('\n')}\n</table>`;
}

/**
 * Render the solver page: the input form, and the solution or error of the
 * last submission if there was one.
 *
 * @param data
 */
export function render_page(data: PageData): string {
    const error = data.error ? `<div class="error">${escape_html(data.error)}</div>` : '';
    const solution = data.grid ? `<div><h2>Solution</h2>\n${render_grid(data.grid)}\n</div>` : '';

    return `<!doctype html>
<html>
<head>
<meta charset="utf-8">
<title>Sudoku Solver</title>
<style>
${STYLE}
</style>
</head>
<body>
<div class="columns">
<div>
${error}
<form action="/" method="POST">
<h2>Input</h2>
<textarea name="sudoku" rows="15">${escape_html(data.source)}</textarea>
<p><input type="submit" value="Compute"></p>
</form>
</div>
${solution}
</div>
</body>
</html>
`;
}
