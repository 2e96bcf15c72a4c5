export const MAILBOX_CLIENT_FACTORY = Symbol('MAILBOX_CLIENT_FACTORY');
export const MAILBOX_SOURCE_OPTIONS = Symbol('MAILBOX_SOURCE_OPTIONS');
