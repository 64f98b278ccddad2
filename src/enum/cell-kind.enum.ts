export enum CellKind {
    FILLED = 'filled',
    OPEN = 'open',
}
