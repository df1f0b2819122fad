/**
 * One update delivered by a transport. The payload is the platform's raw message
 * object; only the fields the normalizer reads are interpreted.
 */
export interface InboundEvent {
  kind: 'message' | 'edited_message';
  payload: unknown;
}
