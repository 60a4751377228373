// src/services/position-sync.service.ts

import { findOutliers, hasReportQuorum, lowerMedian } from '../core/rules/sync.rules';
import { POSITION_TOLERANCE_SECONDS } from '../config/constants';

export type ReconciliationResult = {
    median: number;
    outliers: string[];   // ids de conexión a resincronizar
};

/**
 * Reconciliación de posiciones: acumula la última posición informada por cada
 * conexión y, con quórum, corrige a las que se alejan de la mediana.
 * Una instancia por proceso, compartida por todas las conexiones.
 */
export class PositionReconciler {
    private reports: Map<string, Map<string, number>> = new Map();

    constructor(private readonly tolerance = POSITION_TOLERANCE_SECONDS) {}

    /**
     * Registra (o sobrescribe) la posición de una conexión.
     * Devuelve el resultado si se alcanzó el quórum; null si todavía no.
     */
    report(roomId: string, connectionId: string, position: number, participantCount: number): ReconciliationResult | null {
        let roomReports = this.reports.get(roomId);
        if (!roomReports) {
            roomReports = new Map();
            this.reports.set(roomId, roomReports);
        }
        roomReports.set(connectionId, position);

        if (!hasReportQuorum(roomReports.size, participantCount)) {
            return null;
        }
        return this.evaluate(roomId);
    }

    /**
     * Evalúa y vacía los informes de la sala. Cada pasada empieza de cero.
     */
    evaluate(roomId: string): ReconciliationResult | null {
        const roomReports = this.reports.get(roomId);
        if (!roomReports || roomReports.size === 0) return null;

        const median = lowerMedian(Array.from(roomReports.values()));
        const outliers = findOutliers(roomReports, median, this.tolerance);
        roomReports.clear();

        return { median, outliers };
    }

    pendingReports(roomId: string): number {
        return this.reports.get(roomId)?.size ?? 0;
    }

    clearRoom(roomId: string): void {
        this.reports.delete(roomId);
    }
}
