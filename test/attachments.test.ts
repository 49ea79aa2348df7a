import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, truncateSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  AttachmentError,
  MAX_ATTACHMENT_BYTES,
  imageMimeType,
  loadImageAttachments,
} from '../src/chat/attachments.js';

describe('loadImageAttachments', () => {
  let dir = '';

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'chatgate-attachments-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('maps extensions to image mime types', () => {
    assert.equal(imageMimeType('photo.JPG'), 'image/jpeg');
    assert.equal(imageMimeType('anim.gif'), 'image/gif');
    assert.equal(imageMimeType('notes.txt'), undefined);
  });

  it('reads images as data URIs', async () => {
    const path = join(dir, 'pixel.png');
    writeFileSync(path, Buffer.from([1, 2, 3]));

    assert.deepEqual(await loadImageAttachments([path]), [{ type: 'image', url: 'data:image/png;base64,AQID' }]);
  });

  it('rejects more than five files', async () => {
    const paths = Array.from({ length: 6 }, (_, i) => join(dir, `${i}.png`));
    await assert.rejects(loadImageAttachments(paths), {
      name: 'AttachmentError',
      message: 'You can attach a maximum of 5 files.',
    });
  });

  it('rejects files that are not images', async () => {
    const path = join(dir, 'notes.txt');
    writeFileSync(path, 'hello');
    await assert.rejects(loadImageAttachments([path]), {
      message: 'notes.txt: files must be images (jpeg, jpg, png, gif, webp).',
    });
  });

  it('rejects files over 10MB', async () => {
    const path = join(dir, 'huge.webp');
    writeFileSync(path, '');
    truncateSync(path, MAX_ATTACHMENT_BYTES + 1);
    await assert.rejects(loadImageAttachments([path]), (error: unknown) =>
      error instanceof AttachmentError && error.message === 'huge.webp: each file must be smaller than 10MB.'
    );
  });
});
