export const FORWARDED_SUBJECT_PREFIX = '[forwarded] ';
export const UNKNOWN_SENDER = 'unknown sender';
export const DEFAULT_ATTACHMENT_CONTENT_TYPE = 'application/octet-stream';

export const NO_BODY_TEXT = '(no body content)';
export const ATTACHMENTS_OMITTED_TEXT =
  'Attachments were omitted to keep the transfer alive; download them from the original mailbox.';
export const BODY_UNAVAILABLE_TEXT =
  '(the message body could not be extracted; open the original mailbox to read it)';
