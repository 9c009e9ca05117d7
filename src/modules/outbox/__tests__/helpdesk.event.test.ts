import { EventType } from '../enums/event-type.enum';
import { createDomainEvent } from '../events/domain-event';
import { serviceOrderCreated, ticketCreated, ticketStatusChanged } from '../events/helpdesk.event';

describe('helpdesk events', () => {
  it('should build a ticket.created envelope scoped to the tenant', () => {
    const event = ticketCreated(
      { ticketId: 42, tenantId: 1, numero: 'TKT-1', titulo: 'Printer jammed' },
      { prioridade: 'alta' },
    );

    expect(event).toMatchObject({
      eventType: EventType.TICKET_CREATED,
      aggregateType: 'ticket',
      aggregateId: '42',
      tenantId: 1,
      metadata: null,
      payload: { prioridade: 'alta', ticket_id: 42, numero: 'TKT-1', titulo: 'Printer jammed' },
    });
    expect(event.occurredAt).toBeInstanceOf(Date);
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('should not let extra fields override the core payload', () => {
    const event = ticketStatusChanged(
      { ticketId: 7, tenantId: 2, oldStatus: 'open', newStatus: 'closed' },
      { ticket_id: 999 },
    );

    expect(event.payload).toEqual({ ticket_id: 7, old_status: 'open', new_status: 'closed' });
  });

  it('should use the service order id as aggregate id', () => {
    const event = serviceOrderCreated({ serviceOrderId: 5, tenantId: 3, numeroOs: 'OS-5' });

    expect(event.aggregateType).toBe('service_order');
    expect(event.aggregateId).toBe('5');
    expect(event.eventType).toBe('service_order.created');
  });

  it('should generate distinct ids unless one is supplied', () => {
    const base = { eventType: 'x.y', aggregateType: 'x', aggregateId: '1', payload: {} };

    expect(createDomainEvent(base).eventId).not.toBe(createDomainEvent(base).eventId);
    expect(createDomainEvent({ ...base, eventId: 'fixed' }).eventId).toBe('fixed');
  });
});
