export const WEBHOOK_ENDPOINT_STORE = Symbol('WEBHOOK_ENDPOINT_STORE');
export const WEBHOOK_DELIVERY_STORE = Symbol('WEBHOOK_DELIVERY_STORE');
