import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { parseXmlMetadata, readXmlMetadata } from '../src/core/xmlParser.js';
import { createLogger } from '../src/utils/logger.js';
import { makeTempDir, removeDir } from './helpers/fixtures.js';

const PRIDE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<PRIDE_V5>
  <Series_Info>
    <Attribute Name="Patient Name" Tag="0x00100010" Type="String">VA003</Attribute>
    <Attribute Name="Protocol Name" Tag="0x00181030" Type="String">WIP T1W_3D_TFE</Attribute>
    <Attribute Name="Repetition Time" Type="Float">8.1</Attribute>
    <Attribute Name="Empty Value" Type="String"></Attribute>
  </Series_Info>
  <Image_Array>
    <Image_Info>
      <Key>
        <Attribute Name="Slice" Type="Int32">1</Attribute>
      </Key>
      <Attribute Name="Repetition Time" Type="Float">8.2</Attribute>
      <Attribute Name="Pixel Size" Type="Int16">16</Attribute>
    </Image_Info>
    <Image_Info>
      <Key>
        <Attribute Name="Slice" Type="Int32">2</Attribute>
      </Key>
      <Attribute Name="Pixel Size" Type="Int16">32</Attribute>
    </Image_Info>
  </Image_Array>
</PRIDE_V5>
`;

describe('XML metadata parser', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) removeDir(dir);
    dir = undefined;
    vi.restoreAllMocks();
  });

  it('flattens series and first image attributes with image names prefixed', () => {
    expect(parseXmlMetadata(PRIDE_XML)).toEqual({
      'Patient Name': 'VA003',
      'Protocol Name': 'WIP T1W_3D_TFE',
      'Repetition Time': '8.1',
      Image_Slice: '1',
      'Image_Repetition Time': '8.2',
      'Image_Pixel Size': '16',
    });
  });

  it('keeps the last value of a repeated attribute name', () => {
    const xml =
      '<PRIDE_V5><Series_Info><Attribute Name="A">first</Attribute><Attribute Name="A">second</Attribute></Series_Info></PRIDE_V5>';

    expect(parseXmlMetadata(xml)).toEqual({ A: 'second' });
  });

  it('returns an empty map when neither section exists', () => {
    expect(parseXmlMetadata('<Root><Other>1</Other></Root>')).toEqual({});
  });

  it('throws on malformed XML', () => {
    expect(() => parseXmlMetadata('<Series_Info><Attribute Name="a">x</Series_Info>')).toThrow();
  });

  it('reads a file from disk', () => {
    dir = makeTempDir();
    const file = path.join(dir, 'scan.XML');
    fs.writeFileSync(file, PRIDE_XML);

    expect(readXmlMetadata(file)['Patient Name']).toBe('VA003');
  });

  it('degrades to an empty map for a missing file', () => {
    expect(readXmlMetadata('/nonexistent/scan.XML')).toEqual({});
  });

  it('logs and degrades to an empty map for malformed XML', () => {
    dir = makeTempDir();
    const file = path.join(dir, 'broken.XML');
    fs.writeFileSync(file, '<PRIDE_V5><Series_Info>');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(readXmlMetadata(file, createLogger('warn'))).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain(`Could not parse XML file ${file}`);
  });
});
