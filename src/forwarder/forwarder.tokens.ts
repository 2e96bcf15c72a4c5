export const FORWARDER_OPTIONS = Symbol('FORWARDER_OPTIONS');
