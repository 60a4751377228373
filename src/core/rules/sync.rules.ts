// src/core/rules/sync.rules.ts

import { MIN_POSITION_REPORTS, POSITION_TOLERANCE_SECONDS, REPORT_QUORUM_RATIO } from '../../config/constants';

/**
 * Mediana inferior: en conjuntos pares se toma el elemento medio de abajo.
 * @example lowerMedian([10.2, 9.8, 50, 10]) // 10
 */
export function lowerMedian(values: number[]): number {
    if (values.length === 0) {
        throw new Error('No se puede calcular la mediana de una lista vacía');
    }
    const sorted = [...values].sort((a, b) => a - b);
    return sorted[Math.floor((sorted.length - 1) / 2)];
}

/**
 * Hay quórum cuando informó al menos el 80% de la sala y como mínimo dos conexiones
 */
export function hasReportQuorum(reportCount: number, participantCount: number): boolean {
    return reportCount >= participantCount * REPORT_QUORUM_RATIO && reportCount >= MIN_POSITION_REPORTS;
}

/**
 * Conexiones cuya posición se aleja de la referencia más que la tolerancia
 */
export function findOutliers(
    reports: Map<string, number>,
    reference: number,
    tolerance = POSITION_TOLERANCE_SECONDS
): string[] {
    const outliers: string[] = [];
    for (const [connectionId, position] of reports) {
        if (Math.abs(position - reference) > tolerance) {
            outliers.push(connectionId);
        }
    }
    return outliers;
}
