import { EventType } from '../enums/event-type.enum';
import { createDomainEvent, DomainEvent, EventPayload } from './domain-event';

/**
 * Helpdesk payloads use snake_case to match what webhook subscribers already parse.
 */
export interface InventoryItemCreatedPayload extends EventPayload {
  item_id: number;
  catalog_id: number;
  quantity: number;
}

export interface AssetCreatedPayload extends EventPayload {
  asset_id: number;
  serial_text: string;
}

export interface TicketCreatedPayload extends EventPayload {
  ticket_id: number;
  numero: string;
  titulo: string;
}

export interface TicketStatusChangedPayload extends EventPayload {
  ticket_id: number;
  old_status: string;
  new_status: string;
}

export interface ServiceOrderCreatedPayload extends EventPayload {
  service_order_id: number;
  numero_os: string;
}

export const HELPDESK_EVENT_TYPES: readonly EventType[] = [
  EventType.INVENTORY_ITEM_CREATED,
  EventType.ASSET_CREATED,
  EventType.TICKET_CREATED,
  EventType.TICKET_STATUS_CHANGED,
  EventType.SERVICE_ORDER_CREATED,
];

export const inventoryItemCreated = (
  params: { itemId: number; tenantId: number; catalogId: number; quantity: number },
  extra: EventPayload = {},
): DomainEvent<InventoryItemCreatedPayload> =>
  createDomainEvent({
    eventType: EventType.INVENTORY_ITEM_CREATED,
    aggregateType: 'inventory_item',
    aggregateId: String(params.itemId),
    tenantId: params.tenantId,
    payload: {
      ...extra,
      item_id: params.itemId,
      catalog_id: params.catalogId,
      quantity: params.quantity,
    },
  });

export const assetCreated = (
  params: { assetId: number; tenantId: number; serialText: string },
  extra: EventPayload = {},
): DomainEvent<AssetCreatedPayload> =>
  createDomainEvent({
    eventType: EventType.ASSET_CREATED,
    aggregateType: 'asset',
    aggregateId: String(params.assetId),
    tenantId: params.tenantId,
    payload: { ...extra, asset_id: params.assetId, serial_text: params.serialText },
  });

export const ticketCreated = (
  params: { ticketId: number; tenantId: number; numero: string; titulo: string },
  extra: EventPayload = {},
): DomainEvent<TicketCreatedPayload> =>
  createDomainEvent({
    eventType: EventType.TICKET_CREATED,
    aggregateType: 'ticket',
    aggregateId: String(params.ticketId),
    tenantId: params.tenantId,
    payload: {
      ...extra,
      ticket_id: params.ticketId,
      numero: params.numero,
      titulo: params.titulo,
    },
  });

export const ticketStatusChanged = (
  params: { ticketId: number; tenantId: number; oldStatus: string; newStatus: string },
  extra: EventPayload = {},
): DomainEvent<TicketStatusChangedPayload> =>
  createDomainEvent({
    eventType: EventType.TICKET_STATUS_CHANGED,
    aggregateType: 'ticket',
    aggregateId: String(params.ticketId),
    tenantId: params.tenantId,
    payload: {
      ...extra,
      ticket_id: params.ticketId,
      old_status: params.oldStatus,
      new_status: params.newStatus,
    },
  });

export const serviceOrderCreated = (
  params: { serviceOrderId: number; tenantId: number; numeroOs: string },
  extra: EventPayload = {},
): DomainEvent<ServiceOrderCreatedPayload> =>
  createDomainEvent({
    eventType: EventType.SERVICE_ORDER_CREATED,
    aggregateType: 'service_order',
    aggregateId: String(params.serviceOrderId),
    tenantId: params.tenantId,
    payload: { ...extra, service_order_id: params.serviceOrderId, numero_os: params.numeroOs },
  });
