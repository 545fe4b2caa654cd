/**
 * Máquina de estados explícita para ítems de descarga.
 *
 * Las transiciones no listadas son imposibles; una vez en completed, failed o cancelled
 * el ítem queda inmutable. transitionItem aplica además los sellos de tiempo y campos
 * que acompañan a cada estado.
 *
 * @module engines/ItemStateMachine
 */

import { ItemStatus, type DownloadItem, type ItemStatusType } from './types';

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 * retrying → cancelled/failed cubre la cancelación o el timeout durante la espera del backoff.
 */
const TRANSITIONS: Record<ItemStatusType, readonly ItemStatusType[]> = {
  [ItemStatus.PENDING]: [ItemStatus.DOWNLOADING],
  [ItemStatus.DOWNLOADING]: [
    ItemStatus.COMPLETED,
    ItemStatus.FAILED,
    ItemStatus.RETRYING,
    ItemStatus.CANCELLED,
  ],
  [ItemStatus.RETRYING]: [ItemStatus.DOWNLOADING, ItemStatus.CANCELLED, ItemStatus.FAILED],
  [ItemStatus.COMPLETED]: [],
  [ItemStatus.FAILED]: [],
  [ItemStatus.CANCELLED]: [],
};

export const TERMINAL_STATUSES: readonly ItemStatusType[] = [
  ItemStatus.COMPLETED,
  ItemStatus.FAILED,
  ItemStatus.CANCELLED,
];

export function canTransition(from: ItemStatusType, to: ItemStatusType): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: ItemStatusType): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface TransitionDetails {
  errorMessage?: string;
  filePath?: string;
  now?: number;
}

/**
 * Aplica la transición sobre el ítem si es válida. Devuelve false (sin tocar el ítem)
 * si no lo es.
 */
export function transitionItem(
  item: DownloadItem,
  to: ItemStatusType,
  details: TransitionDetails = {}
): boolean {
  if (!canTransition(item.status, to)) return false;

  const now = details.now ?? Date.now();
  item.status = to;

  switch (to) {
    case ItemStatus.DOWNLOADING:
      if (item.startTime === null) item.startTime = now;
      break;
    case ItemStatus.COMPLETED:
      item.endTime = now;
      if (details.filePath) item.filePath = details.filePath;
      break;
    case ItemStatus.FAILED:
      item.endTime = now;
      item.errorMessage = details.errorMessage ?? '';
      break;
    default:
      break;
  }
  return true;
}
