import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { PlainCodec, ZipCodec, createCodec } from './artifact-codec';
import { isOk, isErr } from '../utils/result';

const report = '<FlexQueryResponse>\n  <Trade symbol="ÄBC"/>\n</FlexQueryResponse>\n';

describe('Artifact Codecs', () => {
  it('picks a codec per layout', () => {
    expect(createCodec('plain')).toBeInstanceOf(PlainCodec);
    expect(createCodec('zip')).toBeInstanceOf(ZipCodec);
  });

  it('stores plain text as UTF-8', async () => {
    const codec = new PlainCodec();
    const data = await codec.encode('base_20260101.xml', report);
    expect(Buffer.from(data).toString('utf-8')).toBe(report);

    const decoded = await codec.decode('base_20260101.xml', data);
    expect(isOk(decoded)).toBe(true);
    if (isOk(decoded)) {
      expect(decoded.value).toBe(report);
    }
  });

  it('stores one member named after the file without .zip', async () => {
    const codec = new ZipCodec();
    const data = await codec.encode('base-20260101.xml.zip', report);

    const zip = await JSZip.loadAsync(data);
    expect(Object.keys(zip.files)).toEqual(['base-20260101.xml']);

    const decoded = await codec.decode('base-20260101.xml.zip', data);
    expect(isOk(decoded)).toBe(true);
    if (isOk(decoded)) {
      expect(decoded.value).toBe(report);
    }
  });

  it('reports bytes that are not a zip as corrupted', async () => {
    const decoded = await new ZipCodec().decode('delta-20260102.patch.zip', Buffer.from('plain text', 'utf-8'));
    expect(isErr(decoded)).toBe(true);
    if (isErr(decoded)) {
      expect(decoded.error.code).toBe('CORRUPTED');
      expect(decoded.error.context).toEqual({ fileName: 'delta-20260102.patch.zip' });
    }
  });

  it('reports an empty zip as corrupted', async () => {
    const empty = await new JSZip().generateAsync({ type: 'uint8array' });
    const decoded = await new ZipCodec().decode('base-20260101.xml.zip', empty);
    expect(isErr(decoded)).toBe(true);
    if (isErr(decoded)) {
      expect(decoded.error.message).toContain('zip has no members');
    }
  });
});
