import { describe, expect, it } from 'vitest';
import { coord, PEERS, square_name, to_digit, UNITS } from '../model/peers.model';

describe('peers', () => {
    it('gives every square 20 peers', () => {
        expect(PEERS).toHaveLength(81);
        for (const peers of PEERS) {
            expect(peers).toHaveLength(20);
        }
    });

    it('lists row, column and box peers of A2', () => {
        const peers = [ ...PEERS[coord(0, 1)] ].sort((a, b) => a - b);

        expect(peers).toEqual([
            0, 2, 3, 4, 5, 6, 7, 8, // row A
            9, 10, 11, 18, 19, 20, // rest of the box
            28, 37, 46, 55, 64, 73, // column 2
        ]);
    });

    it('does not include the square itself nor unrelated squares', () => {
        expect(PEERS[0]).not.toContain(0);
        expect(PEERS[0]).not.toContain(coord(3, 8));
    });

    it('is symmetric', () => {
        PEERS.forEach((peers, square) => {
            for (const peer of peers) {
                expect(PEERS[peer]).toContain(square);
            }
        });
    });

    it('has 27 units of 9 squares', () => {
        expect(UNITS).toHaveLength(27);
        expect(UNITS[0]).toEqual([ 0, 1, 2, 3, 4, 5, 6, 7, 8 ]);
        expect(UNITS[9]).toEqual([ 0, 9, 18, 27, 36, 45, 54, 63, 72 ]);
        expect(UNITS[26]).toEqual([ 60, 61, 62, 69, 70, 71, 78, 79, 80 ]);
    });
});

describe('square names', () => {
    it('names squares by row letter and column number', () => {
        expect(square_name(0)).toBe('A1');
        expect(square_name(coord(2, 3))).toBe('C4');
        expect(square_name(80)).toBe('I9');
    });
});

describe('to_digit', () => {
    it('accepts 1 to 9 only', () => {
        expect(to_digit(1)).toBe(1);
        expect(to_digit(9)).toBe(9);
        expect(to_digit(0)).toBeUndefined();
        expect(to_digit(10)).toBeUndefined();
        expect(to_digit(2.5)).toBeUndefined();
    });
});
