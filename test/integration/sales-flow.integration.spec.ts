import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { assertErrorResponse, createTestApp, principalHeaders } from '../helpers/test-utils';

const BRANCH = 'branch-north';

describe('Sales document flow (Integration)', () => {
  let app: INestApplication;
  let teaId: string;
  let mugId: string;
  let customerId: string;

  const manager = principalHeaders('MANAGER');
  const sales = principalHeaders('SALES', 'sales-7', BRANCH);
  const cashier = principalHeaders('CASHIER', 'cashier-3', BRANCH);

  beforeAll(async () => {
    app = await createTestApp();
    const server = app.getHttpServer();

    const tea = await request(server)
      .post('/api/v1/catalog/variants')
      .set(manager)
      .send({ sku: 'tea-250g', name: 'Green tea 250g', unitPrice: 10000, taxRateBps: 1000 })
      .expect(201);
    teaId = tea.body.id;
    expect(tea.body.sku).toBe('TEA-250G');

    const mug = await request(server)
      .post('/api/v1/catalog/variants')
      .set(manager)
      .send({ sku: 'MUG-WHITE', name: 'White mug', unitPrice: 5000, taxRateBps: 1000 })
      .expect(201);
    mugId = mug.body.id;

    const customer = await request(server)
      .post('/api/v1/catalog/customers')
      .set(manager)
      .send({ name: 'Jordan Lee' })
      .expect(201);
    customerId = customer.body.id;

    for (const variantId of [teaId, mugId]) {
      await request(server)
        .post('/api/v1/stock/replenish')
        .set(principalHeaders('INVENTORY'))
        .send({ variantId, branchId: BRANCH, quantity: 10, ref: `opening-${variantId}` })
        .expect(200);
    }
  });

  afterAll(async () => {
    await app.close();
  });

  it('takes a quotation through to a settled invoice', async () => {
    const server = app.getHttpServer();

    const quotation = await request(server)
      .post('/api/v1/documents')
      .set(sales)
      .send({
        customerId,
        branchId: BRANCH,
        lines: [
          { variantId: teaId, quantity: 2 },
          { variantId: mugId, quantity: 1 },
        ],
      })
      .expect(201);
    const id: string = quotation.body.id;
    expect(quotation.body.stage).toBe('DRAFT');
    expect(quotation.body.totals).toEqual({ subtotal: 25000, tax: 2500, grandTotal: 27500 });

    await request(server).post(`/api/v1/documents/${id}/approve`).set(sales).expect(200);
    const order = await request(server).post(`/api/v1/documents/${id}/convert`).set(sales).expect(200);
    expect(order.body.stage).toBe('CONVERTED');

    const held = await request(server).get(`/api/v1/stock/${teaId}/${BRANCH}`).set(sales).expect(200);
    expect(held.body).toMatchObject({ onHand: 10, reserved: 2 });

    const invoice = await request(server).post(`/api/v1/documents/${id}/invoice`).set(cashier).expect(200);
    expect(invoice.body.stage).toBe('INVOICED');
    expect(invoice.body.balance).toBe(27500);

    const afterInvoice = await request(server).get(`/api/v1/stock/${teaId}/${BRANCH}`).set(sales).expect(200);
    expect(afterInvoice.body).toMatchObject({ onHand: 8, reserved: 0 });

    const partial = await request(server)
      .post('/api/v1/payments')
      .set(cashier)
      .send({ invoiceId: id, amount: 20000, method: 'CASH' })
      .expect(200);
    expect(partial.body).toMatchObject({ stage: 'PARTIALLY_PAID', balance: 7500 });

    const overpay = await request(server)
      .post('/api/v1/payments')
      .set(cashier)
      .send({ invoiceId: id, amount: 8000, method: 'CASH' });
    assertErrorResponse(overpay, 422, 'PAYMENT_MISMATCH');

    const settled = await request(server)
      .post('/api/v1/payments')
      .set(cashier)
      .send({ invoiceId: id, amount: 7500, method: 'CARD' })
      .expect(200);
    expect(settled.body).toMatchObject({ stage: 'SETTLED', balance: 0, amountPaid: 27500 });

    const loyalty = await request(server).get(`/api/v1/payments/loyalty/${customerId}`).set(cashier).expect(200);
    expect(loyalty.body).toEqual({ customerId, points: 2, transactions: 1 });

    const payments = await request(server).get(`/api/v1/payments/${id}`).set(cashier).expect(200);
    expect(payments.body.map((p: { amount: number }) => p.amount)).toEqual([20000, 7500]);

    const transitions = await request(server).get(`/api/v1/documents/${id}/transitions`).set(sales).expect(200);
    expect(transitions.body.map((t: { to: string }) => t.to)).toEqual([
      'DRAFT',
      'APPROVED',
      'CONVERTED',
      'INVOICED',
      'PARTIALLY_PAID',
      'SETTLED',
    ]);

    const audit = await request(server).get(`/api/v1/documents/${id}/audit`).set(sales).expect(200);
    expect(audit.body.map((e: { action: string }) => e.action)).toEqual([
      'created',
      'stage:APPROVED',
      'stage:CONVERTED',
      'stage:INVOICED',
      'stage:PARTIALLY_PAID',
      'stage:SETTLED',
    ]);
    expect(audit.body[0]).toMatchObject({ entityType: 'DOCUMENT', entityId: id, actorId: 'sales-7', role: 'SALES' });
    expect(audit.body[5]).toMatchObject({ actorId: 'cashier-3', role: 'CASHIER' });
  });

  it('refuses to convert when stock is short and holds nothing', async () => {
    const server = app.getHttpServer();
    const quotation = await request(server)
      .post('/api/v1/documents')
      .set(sales)
      .send({ customerId, branchId: BRANCH, lines: [{ variantId: mugId, quantity: 50 }] })
      .expect(201);
    await request(server).post(`/api/v1/documents/${quotation.body.id}/approve`).set(sales).expect(200);

    const response = await request(server).post(`/api/v1/documents/${quotation.body.id}/convert`).set(sales);
    assertErrorResponse(response, 422, 'INSUFFICIENT_STOCK');

    const record = await request(server).get(`/api/v1/stock/${mugId}/${BRANCH}`).set(sales).expect(200);
    expect(record.body.reserved).toBe(0);
  });

  it('cancels a sales order and gives its stock back', async () => {
    const server = app.getHttpServer();
    const quotation = await request(server)
      .post('/api/v1/documents')
      .set(sales)
      .send({ customerId, branchId: BRANCH, lines: [{ variantId: mugId, quantity: 4 }] })
      .expect(201);
    const id: string = quotation.body.id;
    await request(server).post(`/api/v1/documents/${id}/approve`).set(sales).expect(200);
    await request(server).post(`/api/v1/documents/${id}/convert`).set(sales).expect(200);

    const directRelease = await request(server).post('/api/v1/stock/release').set(sales).send({ ref: `${id}:1` });
    assertErrorResponse(directRelease, 409, 'INVALID_STATE_TRANSITION');
    const directDeduct = await request(server).post('/api/v1/stock/deduct').set(manager).send({ ref: `${id}:1` });
    assertErrorResponse(directDeduct, 409, 'INVALID_STATE_TRANSITION');

    const cancelled = await request(server)
      .post(`/api/v1/documents/${id}/cancel`)
      .set(sales)
      .send({ reason: 'customer left' })
      .expect(200);
    expect(cancelled.body.stage).toBe('CANCELLED');

    const record = await request(server).get(`/api/v1/stock/${mugId}/${BRANCH}`).set(sales).expect(200);
    expect(record.body.reserved).toBe(0);

    const again = await request(server).post(`/api/v1/documents/${id}/cancel`).set(sales).send({});
    assertErrorResponse(again, 409, 'INVALID_STATE_TRANSITION');
  });
});
