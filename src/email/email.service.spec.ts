import * as React from 'react';
import { EmailService } from './email.service';

const mockSend = jest.fn();

jest.mock('resend', () => ({
  Resend: jest.fn().mockImplementation(() => ({ emails: { send: mockSend } })),
}));

const message = {
  to: 'dispatch@carrier.test',
  subject: 'Neue Transportanfrage',
  react: React.createElement('p', null, 'hello'),
  text: 'hello',
};

describe('EmailService', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    mockSend.mockReset();
    process.env.RESEND_API_KEY = 'test-key';
    process.env.RESEND_FROM_EMAIL = 'noreply@freight.test';
    process.env.RESEND_FROM_NAME = 'Freight';
    delete process.env.RESEND_REPLY_TO;
  });

  afterEach(() => {
    process.env = { ...saved };
  });

  it('skips sending when no API key is configured', async () => {
    delete process.env.RESEND_API_KEY;
    const service = new EmailService();

    await expect(service.send(message)).resolves.toBe(false);
    expect(mockSend).not.toHaveBeenCalled();
  });

  it('sends the react body with a plain-text alternative', async () => {
    mockSend.mockResolvedValue({ data: { id: 'email-1' }, error: null });
    const service = new EmailService();

    await expect(service.send(message)).resolves.toBe(true);
    expect(mockSend).toHaveBeenCalledWith({
      from: 'Freight <noreply@freight.test>',
      to: 'dispatch@carrier.test',
      subject: 'Neue Transportanfrage',
      react: message.react,
      text: 'hello',
    });
  });

  it('adds reply_to when configured', async () => {
    process.env.RESEND_REPLY_TO = 'ops@freight.test';
    mockSend.mockResolvedValue({ data: { id: 'email-1' }, error: null });

    await new EmailService().send(message);

    expect(mockSend.mock.calls[0][0]).toMatchObject({ reply_to: 'ops@freight.test' });
  });

  it('reports an API error as a failed send', async () => {
    mockSend.mockResolvedValue({
      data: null,
      error: { name: 'validation_error', message: 'Invalid `to` field' },
    });

    await expect(new EmailService().send(message)).resolves.toBe(false);
  });

  it('reports a thrown error as a failed send', async () => {
    mockSend.mockRejectedValue(new Error('socket hang up'));

    await expect(new EmailService().send(message)).resolves.toBe(false);
  });
});
