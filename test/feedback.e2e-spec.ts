import { INestApplication, Logger } from '@nestjs/common';
import request from 'supertest';
import { UserEntity } from '../src/modules/auth/entities/user.entity';
import { ALREADY_DISPUTED_MESSAGE } from '../src/modules/feedback/errors/feedback.errors';
import {
  NotificationDeliveryError,
  PrivateMessageService,
} from '../src/modules/messages/services/private-message.service';
import { bearer, createTestApp, seedUser, settleNotifications } from './utils/test-app';

jest.setTimeout(30000);

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('Feedback API (e2e)', () => {
  let app: INestApplication;
  let alice: UserEntity;
  let bob: UserEntity;
  let carol: UserEntity;
  let moderator: UserEntity;

  beforeEach(async () => {
    app = await createTestApp();

    alice = await seedUser(app, 'alice');
    bob = await seedUser(app, 'bob');
    carol = await seedUser(app, 'carol');
    moderator = await seedUser(app, 'moderator', { admin: true });
  });

  afterEach(async () => {
    await settleNotifications(app);
    await app.close();
  });

  async function leaveFeedback(
    author: UserEntity,
    recipient: UserEntity,
    body: Record<string, unknown>,
  ): Promise<string> {
    const response = await request(app.getHttpServer())
      .post(`/deald-feedback/user/${recipient.username}`)
      .set('Authorization', bearer(app, author))
      .send(body)
      .expect(201);

    return response.body.feedback.id;
  }

  async function openDispute(feedbackId: string, reason = 'Not accurate'): Promise<void> {
    await request(app.getHttpServer())
      .post(`/deald-feedback/${feedbackId}/dispute`)
      .set('Authorization', bearer(app, bob))
      .send({ reason })
      .expect(200);
  }

  describe('GET /deald-feedback/user/:username', () => {
    it('returns an empty listing to anonymous viewers', async () => {
      const response = await request(app.getHttpServer())
        .get('/deald-feedback/user/bob')
        .expect(200);

      expect(response.body).toEqual({
        feedbacks: [],
        stats: { total: 0, positive: 0, neutral: 0, negative: 0, average: 0, disputedPending: 0 },
        canLeaveFeedback: false,
      });
    });

    it('tells the viewer whether they may leave feedback', async () => {
      const server = app.getHttpServer();

      const forBob = await request(server)
        .get('/deald-feedback/user/bob')
        .set('Authorization', bearer(app, alice))
        .expect(200);
      const forSelf = await request(server)
        .get('/deald-feedback/user/alice')
        .set('Authorization', bearer(app, alice))
        .expect(200);
      const forAdmin = await request(server)
        .get('/deald-feedback/user/moderator')
        .set('Authorization', bearer(app, alice))
        .expect(200);

      expect(forBob.body.canLeaveFeedback).toBe(true);
      expect(forSelf.body.canLeaveFeedback).toBe(false);
      expect(forAdmin.body.canLeaveFeedback).toBe(false);
    });

    it('computes statistics over received feedback', async () => {
      await leaveFeedback(alice, bob, { rating: 5, ticketNumber: 'T-1' });
      await leaveFeedback(carol, bob, { rating: 3, ticketNumber: 'T-2' });
      const negative = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-3' });
      await leaveFeedback(carol, bob, { rating: 5, ticketNumber: 'T-4' });
      await openDispute(negative);

      const response = await request(app.getHttpServer())
        .get('/deald-feedback/user/bob')
        .expect(200);

      expect(response.body.feedbacks).toHaveLength(4);
      expect(response.body.stats).toEqual({
        total: 4,
        positive: 2,
        neutral: 1,
        negative: 1,
        average: 3.5,
        disputedPending: 1,
      });
    });

    it('filters by role', async () => {
      await leaveFeedback(alice, bob, { rating: 5, ticketNumber: 'T-1', role: 'seller' });
      await leaveFeedback(carol, bob, { rating: 4, ticketNumber: 'T-2', role: 'buyer' });

      const response = await request(app.getHttpServer())
        .get('/deald-feedback/user/bob?role=seller')
        .expect(200);

      expect(response.body.feedbacks).toHaveLength(1);
      expect(response.body.feedbacks[0].ticketNumber).toBe('T-1');
    });

    it('returns 404 for an unknown username', async () => {
      await request(app.getHttpServer()).get('/deald-feedback/user/nobody').expect(404);
    });
  });

  describe('POST /deald-feedback/user/:username', () => {
    it('requires authentication', async () => {
      await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .send({ rating: 5, ticketNumber: 'T-1' })
        .expect(401);
    });

    it('creates feedback and presents it to the author', async () => {
      const response = await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 4, ticketNumber: ' T-1 ', comment: 'Quick reply', role: 'Seller' })
        .expect(201);

      expect(response.body.feedback).toMatchObject({
        author: { id: alice.id, username: 'alice', avatarTemplate: null },
        recipientId: bob.id,
        rating: 4,
        sentiment: 'positive',
        comment: 'Quick reply',
        ticketNumber: 'T-1',
        role: 'seller',
        disputed: false,
        wasDisputed: false,
        canEdit: true,
        canDelete: true,
        canDispute: false,
      });
    });

    it('stores an unknown role as buyer', async () => {
      const response = await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 3, ticketNumber: 'T-1', role: 'broker' })
        .expect(201);

      expect(response.body.feedback.role).toBe('buyer');
    });

    it('refuses self-feedback and administrator recipients', async () => {
      const self = await request(app.getHttpServer())
        .post('/deald-feedback/user/alice')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 5, ticketNumber: 'T-1' })
        .expect(403);
      const admin = await request(app.getHttpServer())
        .post('/deald-feedback/user/moderator')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 5, ticketNumber: 'T-1' })
        .expect(403);

      expect(self.body.message).toBe('Cannot leave feedback for yourself');
      expect(admin.body.message).toBe('Cannot leave feedback for admin');
    });

    it('returns 404 for an unknown recipient', async () => {
      await request(app.getHttpServer())
        .post('/deald-feedback/user/nobody')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 5, ticketNumber: 'T-1' })
        .expect(404);
    });

    it('rejects duplicates for the same ticket with 422', async () => {
      await leaveFeedback(alice, bob, { rating: 5, ticketNumber: 'T-1' });

      const response = await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 1, ticketNumber: 'T-1' })
        .expect(422);

      expect(response.body).toEqual({
        statusCode: 422,
        error: 'Already left feedback for this ticket',
        code: 'duplicate',
      });
    });

    it('rejects out-of-range ratings and blank tickets with 422', async () => {
      const rating = await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 6, ticketNumber: 'T-1' })
        .expect(422);
      const ticket = await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 5, ticketNumber: '  ' })
        .expect(422);

      expect(rating.body.code).toBe('invalid-rating');
      expect(ticket.body.code).toBe('missing-ticket');
    });

    it('rejects a malformed body with 400', async () => {
      await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .set('Authorization', bearer(app, alice))
        .send({ rating: 4.5, ticketNumber: 'T-1' })
        .expect(400);
    });

    it('messages the recipient', async () => {
      await leaveFeedback(alice, bob, { rating: 5, ticketNumber: 'T-1' });
      await settleNotifications(app);

      const response = await request(app.getHttpServer())
        .get('/messages')
        .set('Authorization', bearer(app, bob))
        .expect(200);

      expect(response.body.messages).toHaveLength(1);
      expect(response.body.messages[0]).toMatchObject({
        senderUsername: 'system',
        recipientId: bob.id,
        title: 'New Feedback Received - Ticket T-1',
      });
    });
  });

  describe('GET /deald-feedback/:id', () => {
    it('computes permissions for the viewer', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 2, ticketNumber: 'T-1' });

      const anonymous = await request(app.getHttpServer()).get(`/deald-feedback/${id}`).expect(200);
      const recipient = await request(app.getHttpServer())
        .get(`/deald-feedback/${id}`)
        .set('Authorization', bearer(app, bob))
        .expect(200);
      const admin = await request(app.getHttpServer())
        .get(`/deald-feedback/${id}`)
        .set('Authorization', bearer(app, moderator))
        .expect(200);

      expect(anonymous.body.feedback).toMatchObject({
        sentiment: 'negative',
        canEdit: false,
        canDelete: false,
        canDispute: false,
      });
      expect(recipient.body.feedback).toMatchObject({
        canEdit: false,
        canDelete: false,
        canDispute: true,
      });
      expect(admin.body.feedback).toMatchObject({
        canEdit: true,
        canDelete: true,
        canDispute: false,
      });
    });

    it('returns 404 for an unknown id and 400 for a malformed one', async () => {
      await request(app.getHttpServer()).get(`/deald-feedback/${MISSING_ID}`).expect(404);
      await request(app.getHttpServer()).get('/deald-feedback/not-a-uuid').expect(400);
    });

    it('treats an invalid token on a public route as an anonymous viewer', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 2, ticketNumber: 'T-1' });

      const listing = await request(app.getHttpServer())
        .get('/deald-feedback/user/bob')
        .set('Authorization', 'Bearer not-a-token')
        .expect(200);
      const single = await request(app.getHttpServer())
        .get(`/deald-feedback/${id}`)
        .set('Authorization', 'Bearer not-a-token')
        .expect(200);

      expect(listing.body.canLeaveFeedback).toBe(false);
      expect(single.body.feedback).toMatchObject({
        canEdit: false,
        canDelete: false,
        canDispute: false,
      });
    });

    it('still rejects an invalid token on protected routes', async () => {
      await request(app.getHttpServer())
        .post('/deald-feedback/user/bob')
        .set('Authorization', 'Bearer not-a-token')
        .send({ rating: 5, ticketNumber: 'T-1' })
        .expect(401);
    });
  });

  describe('DELETE /deald-feedback/:id', () => {
    it('lets the author delete', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 5, ticketNumber: 'T-1' });

      const response = await request(app.getHttpServer())
        .delete(`/deald-feedback/${id}`)
        .set('Authorization', bearer(app, alice))
        .expect(200);

      expect(response.body).toEqual({ success: true });
      await request(app.getHttpServer()).get(`/deald-feedback/${id}`).expect(404);
    });

    it('lets an administrator delete', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 5, ticketNumber: 'T-1' });

      await request(app.getHttpServer())
        .delete(`/deald-feedback/${id}`)
        .set('Authorization', bearer(app, moderator))
        .expect(200);
    });

    it('forbids anybody else, including the recipient', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });

      for (const user of [bob, carol]) {
        const response = await request(app.getHttpServer())
          .delete(`/deald-feedback/${id}`)
          .set('Authorization', bearer(app, user))
          .expect(403);

        expect(response.body.message).toBe('Not authorized');
      }
      await request(app.getHttpServer()).get(`/deald-feedback/${id}`).expect(200);
    });

    it('returns 404 for an unknown id', async () => {
      await request(app.getHttpServer())
        .delete(`/deald-feedback/${MISSING_ID}`)
        .set('Authorization', bearer(app, alice))
        .expect(404);
    });
  });

  describe('POST /deald-feedback/:id/dispute', () => {
    it('lets the recipient open a dispute once', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });

      const response = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/dispute`)
        .set('Authorization', bearer(app, bob))
        .send({ reason: 'Payment was made on time' })
        .expect(200);

      expect(response.body.feedback).toMatchObject({
        disputed: true,
        disputeReason: 'Payment was made on time',
        wasDisputed: false,
        canDispute: false,
      });
      expect(typeof response.body.feedback.disputedAt).toBe('string');

      const again = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/dispute`)
        .set('Authorization', bearer(app, bob))
        .send({})
        .expect(422);

      expect(again.body).toEqual({
        statusCode: 422,
        error: 'This feedback is already disputed and awaiting review.',
        code: 'dispute-open',
      });
    });

    it('accepts a dispute without a reason', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });

      const response = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/dispute`)
        .set('Authorization', bearer(app, bob))
        .expect(200);

      expect(response.body.feedback.disputeReason).toBeNull();
    });

    it('forbids anyone but the recipient', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });

      for (const user of [alice, carol, moderator]) {
        await request(app.getHttpServer())
          .post(`/deald-feedback/${id}/dispute`)
          .set('Authorization', bearer(app, user))
          .send({ reason: 'x' })
          .expect(403);
      }
    });
  });

  describe('POST /deald-feedback/:id/resolve', () => {
    it('is reserved to administrators', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });
      await openDispute(id);

      await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/resolve`)
        .send({ status: 'accepted' })
        .expect(401);
      const response = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/resolve`)
        .set('Authorization', bearer(app, bob))
        .send({ status: 'accepted' })
        .expect(403);

      expect(response.body.message).toBe('Admin access required');
    });

    it('rejects an unknown status with 422', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });
      await openDispute(id);

      const invalid = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/resolve`)
        .set('Authorization', bearer(app, moderator))
        .send({ status: 'maybe' })
        .expect(422);
      const missing = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/resolve`)
        .set('Authorization', bearer(app, moderator))
        .send({})
        .expect(422);

      expect(invalid.body).toEqual({ statusCode: 422, error: 'Invalid status' });
      expect(missing.body).toEqual({ statusCode: 422, error: 'Invalid status' });
    });

    it('deletes the feedback when the dispute is accepted', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });
      await openDispute(id);

      const response = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/resolve`)
        .set('Authorization', bearer(app, moderator))
        .send({ status: 'accepted' })
        .expect(200);

      expect(response.body).toEqual({ success: true, deleted: true });
      await request(app.getHttpServer()).get(`/deald-feedback/${id}`).expect(404);
    });

    it('keeps the feedback when the dispute is rejected and blocks a second dispute', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });
      await openDispute(id);

      const response = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/resolve`)
        .set('Authorization', bearer(app, moderator))
        .send({ status: 'rejected' })
        .expect(200);

      expect(response.body.feedback).toMatchObject({
        id,
        disputed: false,
        wasDisputed: true,
        resolutionStatus: 'rejected',
      });

      const recipientView = await request(app.getHttpServer())
        .get(`/deald-feedback/${id}`)
        .set('Authorization', bearer(app, bob))
        .expect(200);
      expect(recipientView.body.feedback.canDispute).toBe(false);

      const again = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/dispute`)
        .set('Authorization', bearer(app, bob))
        .send({ reason: 'Please reconsider' })
        .expect(422);

      expect(again.body).toEqual({
        statusCode: 422,
        error: ALREADY_DISPUTED_MESSAGE,
        code: 'already-disputed',
      });
    });

    it('refuses feedback that is not under dispute', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });

      const response = await request(app.getHttpServer())
        .post(`/deald-feedback/${id}/resolve`)
        .set('Authorization', bearer(app, moderator))
        .send({ status: 'rejected' })
        .expect(422);

      expect(response.body).toEqual({
        statusCode: 422,
        error: 'Feedback is not under dispute',
        code: 'not-disputed',
      });
    });

    it('returns 404 for an unknown id', async () => {
      await request(app.getHttpServer())
        .post(`/deald-feedback/${MISSING_ID}/resolve`)
        .set('Authorization', bearer(app, moderator))
        .send({ status: 'accepted' })
        .expect(404);
    });
  });

  describe('GET /admin/feedback/disputes', () => {
    it('lists open disputes for administrators only', async () => {
      const open = await leaveFeedback(alice, bob, { rating: 1, ticketNumber: 'T-1' });
      await leaveFeedback(carol, bob, { rating: 2, ticketNumber: 'T-2' });
      await openDispute(open);

      await request(app.getHttpServer())
        .get('/admin/feedback/disputes')
        .set('Authorization', bearer(app, bob))
        .expect(403);
      const response = await request(app.getHttpServer())
        .get('/admin/feedback/disputes')
        .set('Authorization', bearer(app, moderator))
        .expect(200);

      expect(response.body.feedbacks.map((feedback: { id: string }) => feedback.id)).toEqual([open]);
    });
  });

  describe('GET /users/:username/card', () => {
    it('shows the feedback summary without pending disputes', async () => {
      const id = await leaveFeedback(alice, bob, { rating: 4, ticketNumber: 'T-1' });
      await openDispute(id);

      const response = await request(app.getHttpServer()).get('/users/bob/card').expect(200);

      expect(response.body).toEqual({
        user: { id: bob.id, username: 'bob', avatarTemplate: null, admin: false },
        feedbackStats: { total: 1, positive: 1, neutral: 0, negative: 0, average: 4 },
      });
    });

    it('returns 404 for an unknown username', async () => {
      await request(app.getHttpServer()).get('/users/nobody/card').expect(404);
    });
  });
});

describe('Feedback API with an unavailable inbox (e2e)', () => {
  let app: INestApplication;

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  it('still creates the feedback and logs the delivery failure', async () => {
    const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const deliver = jest.fn().mockRejectedValue(new NotificationDeliveryError('inbox unavailable'));

    app = await createTestApp((builder) =>
      builder.overrideProvider(PrivateMessageService).useValue({
        deliver,
        listInbox: jest.fn().mockResolvedValue([]),
      }),
    );
    const alice = await seedUser(app, 'alice');
    await seedUser(app, 'bob');

    const response = await request(app.getHttpServer())
      .post('/deald-feedback/user/bob')
      .set('Authorization', bearer(app, alice))
      .send({ rating: 5, ticketNumber: 'T-1' })
      .expect(201);
    await settleNotifications(app);

    expect(response.body.feedback.ticketNumber).toBe('T-1');
    expect(deliver).toHaveBeenCalledWith(
      expect.objectContaining({
        systemActor: 'system',
        recipientUsername: 'bob',
        title: 'New Feedback Received - Ticket T-1',
      }),
    );
    expect(errorSpy).toHaveBeenCalledWith('Failed to notify feedback recipient: inbox unavailable');
  });
});

describe('Feedback API switched off (e2e)', () => {
  let app: INestApplication;

  afterEach(async () => {
    await app.close();
    delete process.env.FEEDBACK_ENABLED;
  });

  it('answers 404 on every feedback route while disabled', async () => {
    process.env.FEEDBACK_ENABLED = 'false';
    app = await createTestApp();
    const alice = await seedUser(app, 'alice');
    const moderator = await seedUser(app, 'moderator', { admin: true });
    await seedUser(app, 'bob');
    const server = app.getHttpServer();

    await request(server).get('/deald-feedback/user/bob').expect(404);
    await request(server).get(`/deald-feedback/${MISSING_ID}`).expect(404);
    await request(server)
      .post('/deald-feedback/user/bob')
      .send({ rating: 5, ticketNumber: 'T-1' })
      .expect(404);
    await request(server)
      .post('/deald-feedback/user/bob')
      .set('Authorization', bearer(app, alice))
      .send({ rating: 5, ticketNumber: 'T-1' })
      .expect(404);
    await request(server)
      .get('/admin/feedback/disputes')
      .set('Authorization', bearer(app, moderator))
      .expect(404);
    await request(server).get('/users/bob/card').expect(404);

    // The rest of the service keeps working
    await request(server).get('/auth/profile').set('Authorization', bearer(app, alice)).expect(200);
  });

  it('serves the feedback routes when enabled explicitly', async () => {
    process.env.FEEDBACK_ENABLED = 'true';
    app = await createTestApp();
    await seedUser(app, 'bob');

    await request(app.getHttpServer()).get('/deald-feedback/user/bob').expect(200);
    await request(app.getHttpServer()).get('/users/bob/card').expect(200);
  });
});
