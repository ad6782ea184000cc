/**
 * Tests for gallery document extraction
 * Covers deduplication, logo filtering, malformed metadata, and URL unescaping
 */

import { extractPhotoRecords, isLogoAsset, parsePhotoMetadata } from './extract';

function photoItem(id: string, imageUrl: string): string {
  const json = JSON.stringify({ photo: { photo_id: Number(id), photo_img_og: imageUrl } });
  return `<a class="photo-item" data-photo-id="${id}" href="/user/alice/photo/${id}">
    <img src="https://images.example.com/thumb/${id}.jpg">
    <div class="hidden" id="photoJSON_${id}">${json}</div>
  </a>`;
}

function galleryDocument(...items: string[]): string {
  return `<html><body><div class="photo-list">${items.join('\n')}</div></body></html>`;
}

describe('extractPhotoRecords', () => {
  it('should extract records in document order', () => {
    const html = galleryDocument(
      photoItem('101', 'https://images.example.com/photos/101.jpg'),
      photoItem('102', 'https://images.example.com/photos/102.jpg')
    );

    const result = extractPhotoRecords(html, new Set());

    expect(result.records).toEqual([
      { id: '101', imageUrl: 'https://images.example.com/photos/101.jpg' },
      { id: '102', imageUrl: 'https://images.example.com/photos/102.jpg' },
    ]);
    expect(result.skipped).toEqual([]);
  });

  it('should skip ids that were already seen', () => {
    const html = galleryDocument(
      photoItem('101', 'https://images.example.com/photos/101.jpg'),
      photoItem('102', 'https://images.example.com/photos/102.jpg')
    );

    const result = extractPhotoRecords(html, new Set(['101']));

    expect(result.records.map((record) => record.id)).toEqual(['102']);
  });

  it('should report an id repeated within one document once', () => {
    const html = galleryDocument(
      photoItem('101', 'https://images.example.com/photos/101.jpg'),
      photoItem('101', 'https://images.example.com/photos/101-again.jpg')
    );

    const result = extractPhotoRecords(html, new Set());

    expect(result.records).toEqual([{ id: '101', imageUrl: 'https://images.example.com/photos/101.jpg' }]);
  });

  it('should ignore anchors without a photo id', () => {
    const html = galleryDocument(
      '<a class="photo-item"><div id="photoJSON_x">{"photo":{"photo_img_og":"https://images.example.com/x.jpg"}}</div></a>',
      photoItem('103', 'https://images.example.com/photos/103.jpg')
    );

    const result = extractPhotoRecords(html, new Set());

    expect(result.records.map((record) => record.id)).toEqual(['103']);
    expect(result.skipped).toEqual([]);
  });

  it('should ignore anchors without the photo-item class', () => {
    const html = galleryDocument(
      '<a class="other" data-photo-id="9"><div id="photoJSON_9">{"photo":{"photo_img_og":"https://images.example.com/9.jpg"}}</div></a>'
    );

    expect(extractPhotoRecords(html, new Set()).records).toEqual([]);
  });

  it('should drop brewery and beer logo assets', () => {
    const html = galleryDocument(
      photoItem('201', 'https://assets.example.com/site/beer_logos/label-201.jpeg'),
      photoItem('202', 'https://assets.example.com/site/brewery_logos/brewery-202.jpeg'),
      photoItem('203', 'https://images.example.com/photos/203.jpg')
    );

    const result = extractPhotoRecords(html, new Set());

    expect(result.records).toEqual([{ id: '203', imageUrl: 'https://images.example.com/photos/203.jpg' }]);
    expect(result.skipped.map((item) => [item.id, item.reason])).toEqual([
      ['201', 'logo-asset'],
      ['202', 'logo-asset'],
    ]);
  });

  it('should skip one malformed blob and keep the valid items', () => {
    const html = galleryDocument(
      photoItem('301', 'https://images.example.com/photos/301.jpg'),
      '<a class="photo-item" data-photo-id="302"><div id="photoJSON_302">{"photo": {oops</div></a>',
      photoItem('303', 'https://images.example.com/photos/303.jpg')
    );

    const result = extractPhotoRecords(html, new Set());

    expect(result.records.map((record) => record.id)).toEqual(['301', '303']);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].id).toBe('302');
    expect(result.skipped[0].reason).toBe('invalid-json');
  });

  it('should skip items with no metadata container', () => {
    const html = galleryDocument('<a class="photo-item" data-photo-id="401"><img src="x.jpg"></a>');

    const result = extractPhotoRecords(html, new Set());

    expect(result.records).toEqual([]);
    expect(result.skipped).toEqual([{ id: '401', reason: 'missing-metadata' }]);
  });

  it('should skip items whose metadata has no image url', () => {
    const html = galleryDocument(
      '<a class="photo-item" data-photo-id="402"><div id="photoJSON_402">{"photo":{"photo_id":402}}</div></a>'
    );

    expect(extractPhotoRecords(html, new Set()).skipped).toEqual([{ id: '402', reason: 'missing-image-url' }]);
  });

  it('should unescape escaped slashes in the image url', () => {
    const escaped = String.raw`{"photo":{"photo_img_og":"https:\\\/\\\/images.example.com\\\/photos\\\/501.jpg"}}`;
    const html = galleryDocument(
      `<a class="photo-item" data-photo-id="501"><div id="photoJSON_501">${escaped}</div></a>`
    );

    const result = extractPhotoRecords(html, new Set());

    expect(result.records).toEqual([{ id: '501', imageUrl: 'https://images.example.com/photos/501.jpg' }]);
  });

  it('should resolve protocol-relative image urls to https', () => {
    const html = galleryDocument(photoItem('601', '//images.example.com/photos/601.jpg'));

    expect(extractPhotoRecords(html, new Set()).records).toEqual([
      { id: '601', imageUrl: 'https://images.example.com/photos/601.jpg' },
    ]);
  });
});

describe('parsePhotoMetadata', () => {
  it('should return the image url', () => {
    expect(parsePhotoMetadata('{"photo":{"photo_img_og":"https://images.example.com/a.jpg"}}')).toEqual({
      ok: true,
      imageUrl: 'https://images.example.com/a.jpg',
    });
  });

  it('should reject a non-object payload', () => {
    expect(parsePhotoMetadata('[1,2,3]')).toEqual({ ok: false, skip: { reason: 'missing-image-url' } });
  });

  it('should reject a non-string image url', () => {
    expect(parsePhotoMetadata('{"photo":{"photo_img_og":42}}')).toEqual({
      ok: false,
      skip: { reason: 'missing-image-url' },
    });
  });

  it('should reject unsupported url schemes', () => {
    const result = parsePhotoMetadata('{"photo":{"photo_img_og":"data:image/png;base64,AAAA"}}');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.skip.reason).toBe('invalid-url');
    }
  });
});

describe('isLogoAsset', () => {
  it('should match logo path segments anywhere in the url', () => {
    expect(isLogoAsset('https://assets.example.com/beer_logos/x.jpeg')).toBe(true);
    expect(isLogoAsset('https://assets.example.com/a/brewery_logos/b/x.jpeg')).toBe(true);
  });

  it('should not match ordinary photo urls', () => {
    expect(isLogoAsset('https://images.example.com/photos/logos/x.jpg')).toBe(false);
  });
});
