export enum EventType {
  // Inventory
  INVENTORY_ITEM_CREATED = 'inventory.item.created',
  INVENTORY_ITEM_UPDATED = 'inventory.item.updated',
  INVENTORY_ITEM_DELETED = 'inventory.item.deleted',

  // Assets
  ASSET_CREATED = 'asset.created',
  ASSET_UPDATED = 'asset.updated',
  ASSET_STATUS_CHANGED = 'asset.status.changed',
  ASSET_ASSIGNED = 'asset.assigned',

  // Tickets
  TICKET_CREATED = 'ticket.created',
  TICKET_UPDATED = 'ticket.updated',
  TICKET_STATUS_CHANGED = 'ticket.status.changed',
  TICKET_ASSIGNED = 'ticket.assigned',
  TICKET_RESOLVED = 'ticket.resolved',
  TICKET_CLOSED = 'ticket.closed',
  TICKET_SLA_BREACHED = 'ticket.sla.breached',

  // Service orders
  SERVICE_ORDER_CREATED = 'service_order.created',
  SERVICE_ORDER_UPDATED = 'service_order.updated',
  SERVICE_ORDER_STATUS_CHANGED = 'service_order.status.changed',
  SERVICE_ORDER_ACTIVITY_ADDED = 'service_order.activity.added',
  SERVICE_ORDER_COMPLETED = 'service_order.completed',

  // Users
  USER_CREATED = 'user.created',
  USER_UPDATED = 'user.updated',
  USER_LOGIN = 'user.login',

  // Companies
  COMPANY_CREATED = 'company.created',
  COMPANY_UPDATED = 'company.updated',

  // Synthetic, sent by endpoint tests only
  WEBHOOK_TEST = 'webhook.test',
}
