/**
 * @fileoverview Re-exporta mensajes desde shared para uso en el motor y el CLI
 * @module constants/messages
 */

export {
  INFO_MESSAGES,
  formatRetryMessage,
  formatItemStarted,
  formatItemCompleted,
  formatItemFailed,
  formatAllSucceeded,
  formatPartialSummary,
  formatResolved,
  formatSessionStarting,
  formatSettingsSummary,
} from '../../shared/constants/messages';
