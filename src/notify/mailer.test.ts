import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SendError } from '../errors';
import { ResendMailSender } from './mailer';

const send = vi.hoisted(() => vi.fn());

vi.mock('resend', () => ({
  Resend: class {
    emails = { send };
  },
}));

describe('ResendMailSender', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    send.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('refuses to send without an API key', async () => {
    await expect(new ResendMailSender(null).send('a@example.com', 'b@example.com', 's', '<p>x</p>')).rejects.toThrow(
      'RESEND_API_KEY is not set',
    );
    expect(send).not.toHaveBeenCalled();
  });

  it('hands the message to Resend', async () => {
    send.mockResolvedValue({ data: { id: 'msg-1' }, error: null });

    await new ResendMailSender('test-key').send('from@example.com', 'to@example.com', 'Subject', '<p>Body</p>');

    expect(send).toHaveBeenCalledWith({
      from: 'from@example.com',
      to: 'to@example.com',
      subject: 'Subject',
      html: '<p>Body</p>',
    });
  });

  it('turns an error response into a SendError', async () => {
    send.mockResolvedValue({ data: null, error: { name: 'validation_error', message: 'Invalid `to` field' } });

    const sending = new ResendMailSender('test-key').send('from@example.com', 'bad', 'Subject', '<p>Body</p>');

    await expect(sending).rejects.toBeInstanceOf(SendError);
    await expect(sending).rejects.toThrow('Failed to send email to bad: Invalid `to` field');
  });

  it('wraps a thrown transport error', async () => {
    const cause = new Error('socket hang up');
    send.mockRejectedValue(cause);

    const err: unknown = await new ResendMailSender('test-key')
      .send('from@example.com', 'to@example.com', 'Subject', '<p>Body</p>')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SendError);
    expect(err instanceof SendError && err.cause).toBe(cause);
  });
});
