import { describe, expect, it } from 'vitest';
import { PositionReconciler } from '../../src/services/position-sync.service';

describe('PositionReconciler', () => {
    it('espera el quórum y resincroniza solo a los alejados de la mediana', () => {
        const reconciler = new PositionReconciler();

        expect(reconciler.report('room-1', 'conn-1', 10.0, 4)).toBeNull();
        expect(reconciler.report('room-1', 'conn-2', 10.2, 4)).toBeNull();
        expect(reconciler.report('room-1', 'conn-3', 9.8, 4)).toBeNull();

        const result = reconciler.report('room-1', 'conn-4', 50.0, 4);
        expect(result).toEqual({ median: 10.0, outliers: ['conn-4'] });
        expect(reconciler.pendingReports('room-1')).toBe(0);
    });

    it('un solo participante nunca alcanza el quórum', () => {
        const reconciler = new PositionReconciler();

        expect(reconciler.report('room-1', 'conn-1', 10, 1)).toBeNull();
        expect(reconciler.pendingReports('room-1')).toBe(1);
    });

    it('un nuevo informe de la misma conexión sobrescribe el anterior', () => {
        const reconciler = new PositionReconciler();

        reconciler.report('room-1', 'conn-1', 10, 3);
        reconciler.report('room-1', 'conn-1', 11, 3);
        expect(reconciler.pendingReports('room-1')).toBe(1);
    });

    it('mantiene separados los informes de cada sala', () => {
        const reconciler = new PositionReconciler();

        reconciler.report('room-1', 'conn-1', 10, 3);
        reconciler.report('room-2', 'conn-2', 99, 3);
        reconciler.clearRoom('room-1');

        expect(reconciler.pendingReports('room-1')).toBe(0);
        expect(reconciler.pendingReports('room-2')).toBe(1);
        expect(reconciler.evaluate('room-1')).toBeNull();
    });

    it('respeta la tolerancia configurada', () => {
        const reconciler = new PositionReconciler(0.5);

        reconciler.report('room-1', 'conn-1', 10, 2);
        expect(reconciler.report('room-1', 'conn-2', 11, 2)).toEqual({ median: 10, outliers: ['conn-2'] });
    });
});
