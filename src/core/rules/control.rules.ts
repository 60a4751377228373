// src/core/rules/control.rules.ts

import { Participant } from '../domain';

/**
 * Reglas puras sobre el rol de controlador de una sala.
 * Todas devuelven copias; nunca mutan la lista recibida.
 */

/**
 * Ordena por fecha de entrada ascendente (empate: id)
 */
export function orderByJoin(participants: Participant[]): Participant[] {
    return [...participants].sort((a, b) =>
        a.joinedAt - b.joinedAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
    );
}

export function findController(participants: Participant[]): Participant | null {
    return orderByJoin(participants).find(p => p.hasControl) ?? null;
}

/**
 * Da el control a `controllerId` y se lo quita al resto.
 * Si el id no está en la lista nadie queda con control.
 */
export function assignController(participants: Participant[], controllerId: string | null): Participant[] {
    return participants.map(p => ({ ...p, hasControl: p.id === controllerId }));
}

/**
 * Sucesión: el control pasa al participante más antiguo que no sea `excludingId`
 */
export function nextControllerId(participants: Participant[], excludingId: string): string | null {
    const candidate = orderByJoin(participants).find(p => p.id !== excludingId);
    return candidate ? candidate.id : null;
}

/**
 * Garantiza exactamente un controlador en una sala no vacía:
 * sin controlador se lo da al más antiguo; con varios conserva solo al más antiguo.
 */
export function repairControl(participants: Participant[]): Participant[] {
    if (participants.length === 0) return [];

    const ordered = orderByJoin(participants);
    const holder = ordered.find(p => p.hasControl) ?? ordered[0];

    return assignController(participants, holder.id);
}
