/**
 * Grid addressing for the 5x5 child slots of a tile.
 *
 * Columns grow to the right and rows grow downward, matching screen space.
 */

export const GRID_SIZE = 5;

export interface GridAddress {
    readonly col: number;
    readonly row: number;
}

export const CENTER_ADDRESS: GridAddress = { col: 2, row: 2 };

/** Row-major integer key of an address, used to index child maps. */
export type AddressKey = number;

export type GridDirection = 'left' | 'right' | 'up' | 'down';

export const GRID_DIRECTIONS: readonly GridDirection[] = ['left', 'right', 'up', 'down'];

const DIRECTION_DELTAS: Record<GridDirection, { readonly dx: number; readonly dy: number }> = {
    left: { dx: -1, dy: 0 },
    right: { dx: 1, dy: 0 },
    up: { dx: 0, dy: -1 },
    down: { dx: 0, dy: 1 },
};

const OPPOSITES: Record<GridDirection, GridDirection> = {
    left: 'right',
    right: 'left',
    up: 'down',
    down: 'up',
};

export function directionDelta(direction: GridDirection): { readonly dx: number; readonly dy: number } {
    return DIRECTION_DELTAS[direction];
}

export function oppositeDirection(direction: GridDirection): GridDirection {
    return OPPOSITES[direction];
}

export function gridAddress(col: number, row: number): GridAddress {
    return { col, row };
}

export function isValidAddress(address: GridAddress): boolean {
    return (
        Number.isInteger(address.col) &&
        Number.isInteger(address.row) &&
        address.col >= 0 && address.col < GRID_SIZE &&
        address.row >= 0 && address.row < GRID_SIZE
    );
}

export function clampAddress(address: GridAddress): GridAddress {
    return {
        col: Math.min(Math.max(address.col, 0), GRID_SIZE - 1),
        row: Math.min(Math.max(address.row, 0), GRID_SIZE - 1),
    };
}

function wrapIndex(value: number): number {
    const r = value % GRID_SIZE;
    return r < 0 ? r + GRID_SIZE : r;
}

export function wrapAddress(address: GridAddress): GridAddress {
    return { col: wrapIndex(address.col), row: wrapIndex(address.row) };
}

/** Step one slot in `direction`. The result may lie outside the grid. */
export function offsetAddress(address: GridAddress, direction: GridDirection): GridAddress {
    const { dx, dy } = DIRECTION_DELTAS[direction];
    return { col: address.col + dx, row: address.row + dy };
}

export function addressKey(address: GridAddress): AddressKey {
    return address.row * GRID_SIZE + address.col;
}

export function addressFromKey(key: AddressKey): GridAddress {
    return { col: key % GRID_SIZE, row: Math.floor(key / GRID_SIZE) };
}

export function addressEquals(a: GridAddress, b: GridAddress): boolean {
    return a.col === b.col && a.row === b.row;
}

export function formatAddress(address: GridAddress): string {
    return `(${address.col},${address.row})`;
}
