export const RELAY_TRANSPORT_FACTORY = Symbol('RELAY_TRANSPORT_FACTORY');
export const RELAY_DESTINATION_CONFIG = Symbol('RELAY_DESTINATION_CONFIG');
