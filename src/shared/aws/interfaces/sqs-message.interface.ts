export interface SqsSendResult {
  messageId: string;
  sequenceNumber?: string;
}
