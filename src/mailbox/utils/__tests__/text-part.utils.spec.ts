import type { MessageOutline } from '../../interfaces/mailbox-client.interface';
import { findBodyPart, isMultipart, isTextType, selectTextPart } from '../text-part.utils';

describe('text-part utils', () => {
  describe('selectTextPart', () => {
    it('should prefer HTML over plain text', () => {
      const root: MessageOutline = {
        type: 'multipart/alternative',
        childNodes: [
          { part: '1', type: 'text/plain' },
          { part: '2', type: 'text/html' },
        ],
      };

      expect(selectTextPart(root)).toBe('2');
    });

    it('should descend into nested multiparts', () => {
      const root: MessageOutline = {
        type: 'multipart/mixed',
        childNodes: [
          {
            part: '1',
            type: 'multipart/related',
            childNodes: [
              { part: '1.1', type: 'text/plain' },
              { part: '1.2', type: 'image/png', disposition: 'inline' },
            ],
          },
          { part: '2', type: 'application/zip', disposition: 'attachment' },
        ],
      };

      expect(selectTextPart(root)).toBe('1.1');
    });

    it('should ignore text parts attached as files', () => {
      const root: MessageOutline = {
        type: 'multipart/mixed',
        childNodes: [
          { part: '1', type: 'text/html', disposition: 'ATTACHMENT' },
          { part: '2', type: 'text/plain' },
        ],
      };

      expect(selectTextPart(root)).toBe('2');
    });

    it('should keep to the message itself when it carries an attached message', () => {
      const root: MessageOutline = {
        type: 'multipart/mixed',
        childNodes: [
          { part: '1', type: 'text/plain' },
          {
            part: '2',
            type: 'message/rfc822',
            disposition: 'attachment',
            childNodes: [{ part: '2.1', type: 'text/html' }],
          },
        ],
      };

      expect(selectTextPart(root)).toBe('1');
    });

    it('should not pick the body of an inline forwarded message', () => {
      const root: MessageOutline = {
        type: 'multipart/mixed',
        childNodes: [
          { part: '1', type: 'text/plain' },
          { part: '2', type: 'message/rfc822', childNodes: [{ part: '2.1', type: 'text/html' }] },
        ],
      };

      expect(selectTextPart(root)).toBe('1');
    });

    it('should return undefined when no text part exists', () => {
      const root: MessageOutline = {
        type: 'multipart/mixed',
        childNodes: [{ part: '1', type: 'application/pdf', disposition: 'attachment' }],
      };

      expect(selectTextPart(root)).toBeUndefined();
    });
  });

  it('should classify multipart roots and text types', () => {
    expect(isMultipart({ type: 'text/plain' })).toBe(false);
    expect(isMultipart({ type: 'multipart/mixed', childNodes: [{ part: '1', type: 'text/plain' }] })).toBe(true);
    expect(isTextType('TEXT/HTML')).toBe(true);
    expect(isTextType('text/calendar')).toBe(false);
  });

  it('should look up fetched sections regardless of case', () => {
    const parts = new Map([['1.2.mime', Buffer.from('Content-Type: text/html\r\n\r\n')]]);

    expect(findBodyPart(parts, '1.2.MIME')?.toString()).toBe('Content-Type: text/html\r\n\r\n');
    expect(findBodyPart(parts, '1.2')).toBeUndefined();
    expect(findBodyPart(undefined, 'TEXT')).toBeUndefined();
  });
});
