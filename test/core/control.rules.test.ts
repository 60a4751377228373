import { describe, expect, it } from 'vitest';
import {
    assignController,
    findController,
    nextControllerId,
    orderByJoin,
    repairControl
} from '../../src/core/rules/control.rules';
import { participant } from '../helpers/fixtures';

describe('control.rules', () => {
    it('ordena por fecha de entrada y desempata por id', () => {
        const list = [participant('c', 200), participant('b', 100), participant('a', 100)];
        expect(orderByJoin(list).map(p => p.id)).toEqual(['a', 'b', 'c']);
    });

    it('el sucesor es el más antiguo distinto del excluido', () => {
        const list = [participant('a', 100), participant('b', 200), participant('c', 300)];
        expect(nextControllerId(list, 'a')).toBe('b');
        expect(nextControllerId(list, 'b')).toBe('a');
        expect(nextControllerId([participant('a', 100)], 'a')).toBeNull();
    });

    it('assignController deja un único controlador', () => {
        const list = [participant('a', 100, { hasControl: true }), participant('b', 200)];
        const after = assignController(list, 'b');

        expect(after.filter(p => p.hasControl).map(p => p.id)).toEqual(['b']);
        expect(list[0].hasControl).toBe(true);
    });

    it('repairControl da el control al más antiguo si nadie lo tiene', () => {
        const after = repairControl([participant('b', 200), participant('a', 100)]);
        expect(findController(after)?.id).toBe('a');
    });

    it('repairControl conserva solo al controlador más antiguo', () => {
        const after = repairControl([
            participant('a', 100),
            participant('b', 200, { hasControl: true }),
            participant('c', 300, { hasControl: true })
        ]);
        expect(after.filter(p => p.hasControl).map(p => p.id)).toEqual(['b']);
    });

    it('repairControl no hace nada en una sala vacía', () => {
        expect(repairControl([])).toEqual([]);
    });
});
