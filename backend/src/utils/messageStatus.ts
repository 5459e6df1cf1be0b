import { MessageStatus } from '../types';

/**
 * Forward-only message status machine.
 * failed is terminal and only reachable from pending; a retry is a new message.
 */
const TRANSITIONS: Record<MessageStatus, readonly MessageStatus[]> = {
  pending: ['sent', 'failed'],
  sent: ['delivered', 'read'],
  delivered: ['read'],
  read: [],
  failed: [],
};

const ALL_STATUSES: readonly MessageStatus[] = ['pending', 'sent', 'delivered', 'read', 'failed'];

export const canTransition = (from: MessageStatus, to: MessageStatus): boolean =>
  TRANSITIONS[from].includes(to);

/** Statuses a message may be in for a move to `to` to be accepted */
export const predecessorsOf = (to: MessageStatus): MessageStatus[] =>
  ALL_STATUSES.filter((from) => canTransition(from, to));

/** True once the platform has accepted the message */
export const wasSent = (status: MessageStatus): boolean =>
  status === 'sent' || status === 'delivered' || status === 'read';
