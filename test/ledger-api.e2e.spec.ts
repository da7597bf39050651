import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './utils/create-test-app';

describe('Ledger API (e2e)', () => {
  let app: INestApplication;

  const openAccount = (accountId: string, initialBalance: unknown) =>
    request(app.getHttpServer())
      .post('/api/accounts')
      .send({ account_id: accountId, initial_balance: initialBalance });

  const transfer = (body: Record<string, unknown>) =>
    request(app.getHttpServer()).post('/api/transactions').send(body);

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('accounts', () => {
    it('opens an account and reads its balance', async () => {
      await openAccount('ACC001', 1000).expect(201, {
        account_id: 'ACC001',
        initial_balance: '1000.00',
      });

      await request(app.getHttpServer())
        .get('/api/accounts/ACC001')
        .expect(200, { account_id: 'ACC001', balance: '1000.00' });
    });

    it('answers 409 for a duplicate account id', async () => {
      await openAccount('ACC001', '10.00').expect(201);

      await openAccount('ACC001', '20.00').expect(409, {
        error: 'CONFLICT',
        message: 'Account with ID ACC001 already exists',
        errorCode: 'ACCOUNT_ALREADY_EXISTS',
      });
    });

    it('answers 400 for a non-positive opening balance', async () => {
      await openAccount('ACC001', 0).expect(400, {
        error: 'BAD_REQUEST',
        message: 'Initial balance must be positive: 0.00',
        errorCode: 'INVALID_BALANCE',
      });
    });

    it('answers 400 for an opening balance too large to store', async () => {
      await openAccount('ACC001', '100000000000000000.00').expect(400, {
        error: 'BAD_REQUEST',
        message:
          'Initial balance exceeds the largest storable amount: 100000000000000000.00',
        errorCode: 'INVALID_BALANCE',
      });
    });

    it('answers 400 with a validation error when the account id is missing', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/accounts')
        .send({ initial_balance: 10 })
        .expect(400);

      expect(response.body).toMatchObject({
        error: 'BAD_REQUEST',
        errorCode: 'VALIDATION_ERROR',
      });
      expect(response.body.message).toContain(
        'account_id: Account ID cannot be null or empty',
      );
    });

    it('answers 404 for an unknown account', async () => {
      await request(app.getHttpServer())
        .get('/api/accounts/ACC404')
        .expect(404, {
          error: 'NOT_FOUND',
          message: 'Account with ID ACC404 not found',
          errorCode: 'ACCOUNT_NOT_FOUND',
        });
    });
  });

  describe('transactions', () => {
    beforeEach(async () => {
      await openAccount('ACC001', 1000).expect(201);
      await openAccount('ACC002', 500).expect(201);
    });

    it('completes a transfer with 201 and moves the money', async () => {
      const response = await transfer({
        source_account_id: 'ACC001',
        destination_account_id: 'ACC002',
        amount: 300,
      }).expect(201);

      expect(response.body).toEqual({
        transaction_id: expect.any(String),
        source_account_id: 'ACC001',
        destination_account_id: 'ACC002',
        amount: '300.00',
        status: 'COMPLETED',
        error_message: null,
      });

      await request(app.getHttpServer())
        .get('/api/accounts/ACC001')
        .expect(200, { account_id: 'ACC001', balance: '700.00' });
      await request(app.getHttpServer())
        .get('/api/accounts/ACC002')
        .expect(200, { account_id: 'ACC002', balance: '800.00' });

      await request(app.getHttpServer())
        .get(`/api/transactions/${response.body.transaction_id}`)
        .expect(200, response.body);
    });

    it('answers a rejected transfer with 400 and the FAILED record', async () => {
      const response = await transfer({
        source_account_id: 'ACC001',
        destination_account_id: 'ACC002',
        amount: '1500',
      }).expect(400);

      expect(response.body).toEqual({
        transaction_id: expect.any(String),
        source_account_id: 'ACC001',
        destination_account_id: 'ACC002',
        amount: '1500.00',
        status: 'FAILED',
        error_message:
          'Insufficient balance in source account. Available: 1000.00, Required: 1500.00',
      });

      await request(app.getHttpServer())
        .get(`/api/transactions/${response.body.transaction_id}`)
        .expect(200, response.body);
      await request(app.getHttpServer())
        .get('/api/accounts/ACC001')
        .expect(200, { account_id: 'ACC001', balance: '1000.00' });
    });

    it('records a request without an amount', async () => {
      const response = await transfer({
        source_account_id: 'ACC001',
        destination_account_id: 'ACC002',
      }).expect(400);

      expect(response.body).toMatchObject({
        amount: null,
        status: 'FAILED',
        error_message: 'Transaction amount cannot be null',
      });
    });

    it('reads numeric account ids as strings', async () => {
      const response = await transfer({
        source_account_id: 123,
        destination_account_id: 'ACC002',
        amount: 10,
      }).expect(400);

      expect(response.body).toMatchObject({
        source_account_id: '123',
        error_message: 'Account with ID 123 not found',
      });
    });

    it('lists the history of an account', async () => {
      await transfer({
        source_account_id: 'ACC001',
        destination_account_id: 'ACC002',
        amount: 100,
      }).expect(201);
      await transfer({
        source_account_id: 'ACC002',
        destination_account_id: 'ACC999',
        amount: 5,
      }).expect(400);

      const response = await request(app.getHttpServer())
        .get('/api/transactions/account/ACC002')
        .expect(200);

      expect(response.body.count).toBe(2);
      expect(
        response.body.transactions.map(
          (t: { status: string }) => t.status,
        ),
      ).toEqual(['COMPLETED', 'FAILED']);
    });

    it('answers 404 for an unknown transaction', async () => {
      await request(app.getHttpServer())
        .get('/api/transactions/tx-404')
        .expect(404, {
          error: 'NOT_FOUND',
          message: 'Transaction with ID tx-404 not found',
          errorCode: 'TRANSACTION_NOT_FOUND',
        });
    });
  });

  describe('operations', () => {
    it('reports health outside the api prefix', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.body.status).toBe('ok');
      expect(typeof response.body.uptime).toBe('number');
    });

    it('exposes Prometheus metrics', async () => {
      await openAccount('ACC001', 10).expect(201);

      const response = await request(app.getHttpServer())
        .get('/api/metrics')
        .expect(200);

      expect(response.headers['content-type']).toContain('version=0.0.4');
      expect(response.text).toContain(
        'app_account_operations_total{operation_type="create",status="success"} 1',
      );
    });
  });
});
