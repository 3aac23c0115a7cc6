import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { buildTestApp, TEST_JWT_SECRET } from '../helpers/build-test-app';
import { VendorProfileSchema, bearer, parseError, registerAndLogin } from '../helpers/api';

describe('GET /auth/me', () => {
  it('returns the authenticated vendor profile', async () => {
    const { app, clock, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, {
        email: 'me@example.com',
        name: 'Dana Brewer',
        businessName: 'Corner Coffee',
      });

      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: session.headers });

      expect(res.statusCode).toBe(200);
      expect(VendorProfileSchema.parse(res.json())).toEqual({
        vendor_id: session.vendorId,
        name: 'Dana Brewer',
        email: 'me@example.com',
        business_name: 'Corner Coffee',
        created_at: clock.now().toISOString(),
        updated_at: clock.now().toISOString(),
      });
    } finally {
      await close();
    }
  });

  it('requires a bearer token', async () => {
    const { app, close } = await buildTestApp();

    try {
      const missing = await app.inject({ method: 'GET', url: '/auth/me' });
      const wrongScheme = await app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: { authorization: 'Basic dGVzdDp0ZXN0' },
      });

      for (const res of [missing, wrongScheme]) {
        expect(res.statusCode).toBe(401);
        expect(parseError(res).error).toEqual({
          code: 'UNAUTHORIZED',
          message: 'Authentication required',
        });
      }
    } finally {
      await close();
    }
  });

  it('rejects a token signed with another secret', async () => {
    const { app, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, { email: 'me@example.com' });
      const forged = jwt.sign(
        { vendor_id: session.vendorId, email: session.email },
        'some-other-test-secret',
      );

      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(forged) });

      expect(res.statusCode).toBe(401);
      expect(parseError(res).error.message).toBe('Invalid token');
    } finally {
      await close();
    }
  });

  it('rejects a token without vendor_id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = jwt.sign({ email: 'me@example.com' }, TEST_JWT_SECRET);

      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(token) });

      expect(res.statusCode).toBe(401);
      expect(parseError(res).error.message).toBe('Invalid token');
    } finally {
      await close();
    }
  });

  it('answers 404 when the token names a vendor that does not exist', async () => {
    const { app, store, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, { email: 'gone@example.com' });
      store.vendors.delete(session.vendorId);

      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: session.headers });

      expect(res.statusCode).toBe(404);
      expect(parseError(res).error).toEqual({ code: 'NOT_FOUND', message: 'Vendor not found' });

      const notUuid = jwt.sign({ vendor_id: 'vendor-1', email: 'x@example.com' }, TEST_JWT_SECRET);
      const res2 = await app.inject({ method: 'GET', url: '/auth/me', headers: bearer(notUuid) });
      expect(res2.statusCode).toBe(404);
    } finally {
      await close();
    }
  });

  it('keeps a token valid within its TTL and rejects it 61 minutes after login', async () => {
    const { app, clock, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, { email: 'ttl@example.com' });

      clock.advanceMinutes(59);
      const stillValid = await app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: session.headers,
      });
      expect(stillValid.statusCode).toBe(200);

      clock.advanceMinutes(2);
      const expired = await app.inject({ method: 'GET', url: '/auth/me', headers: session.headers });

      expect(expired.statusCode).toBe(401);
      expect(parseError(expired).error).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Token expired',
      });
    } finally {
      await close();
    }
  });
});

describe('PUT /auth/me', () => {
  it('updates business_name and refreshes updated_at', async () => {
    const { app, clock, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, {
        email: 'update@example.com',
        name: 'Dana Brewer',
        businessName: 'Corner Coffee',
      });
      const createdAt = clock.now().toISOString();

      clock.advanceMinutes(5);
      const res = await app.inject({
        method: 'PUT',
        url: '/auth/me',
        headers: session.headers,
        payload: { business_name: 'Corner Coffee & Bakery' },
      });

      expect(res.statusCode).toBe(200);
      const body = VendorProfileSchema.parse(res.json());
      expect(body.name).toBe('Dana Brewer');
      expect(body.business_name).toBe('Corner Coffee & Bakery');
      expect(body.created_at).toBe(createdAt);
      expect(body.updated_at).toBe(clock.now().toISOString());
    } finally {
      await close();
    }
  });

  it('keeps the old profile when the update cannot be audited', async () => {
    const { app, store, auditRepo, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, {
        email: 'update@example.com',
        businessName: 'Corner Coffee',
      });
      auditRepo.failOn = 'vendor.profile.updated';

      const res = await app.inject({
        method: 'PUT',
        url: '/auth/me',
        headers: session.headers,
        payload: { business_name: 'Corner Coffee & Bakery' },
      });

      expect(res.statusCode).toBe(500);
      expect(store.vendors.get(session.vendorId)?.businessName).toBe('Corner Coffee');
    } finally {
      await close();
    }
  });

  it('treats an empty body as a no-op', async () => {
    const { app, clock, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, { email: 'noop@example.com' });
      const registeredAt = clock.now().toISOString();

      clock.advanceMinutes(5);
      const res = await app.inject({
        method: 'PUT',
        url: '/auth/me',
        headers: session.headers,
        payload: {},
      });

      expect(res.statusCode).toBe(200);
      expect(VendorProfileSchema.parse(res.json()).updated_at).toBe(registeredAt);
    } finally {
      await close();
    }
  });

  it('ignores email and rejects an empty name', async () => {
    const { app, store, close } = await buildTestApp();

    try {
      const session = await registerAndLogin(app, { email: 'keep@example.com' });

      const emailChange = await app.inject({
        method: 'PUT',
        url: '/auth/me',
        headers: session.headers,
        payload: { email: 'other@example.com', name: 'Renamed' },
      });
      expect(emailChange.statusCode).toBe(200);
      expect(store.vendors.get(session.vendorId)?.email).toBe('keep@example.com');
      expect(store.vendors.get(session.vendorId)?.name).toBe('Renamed');

      const emptyName = await app.inject({
        method: 'PUT',
        url: '/auth/me',
        headers: session.headers,
        payload: { name: '   ' },
      });
      expect(emptyName.statusCode).toBe(400);
      expect(parseError(emptyName).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });

  it('requires authentication', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'PUT', url: '/auth/me', payload: { name: 'X' } });
      expect(res.statusCode).toBe(401);
    } finally {
      await close();
    }
  });
});
