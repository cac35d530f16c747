import {
  detectEncoding,
  Encoding,
  FormatRegistry,
  HeadersBinaryMessage,
  IllegalStateError,
  InvalidAttributeError,
  JsonFormat,
  MissingDataError,
  readMessage,
  structuredToBinary,
  UnrecognizedSpecVersionError,
  UnsupportedExtensionTypeError,
  writeBinary,
} from '../src';
import { CsvFormat } from './helpers/csv-format';
import {
  allEvents,
  allEventsWithStringExtensions,
  DATA_JSON_SERIALIZED,
  DATASCHEMA,
  NamedEvent,
  SOURCE,
  TIME,
  TYPE,
  V1_MIN,
  V1_WITH_JSON_DATA,
  V1_WITH_JSON_DATA_WITH_EXT,
  V1_WITH_JSON_DATA_WITH_EXT_STRING,
} from './helpers/data';

const EXPECTED_HEADERS = {
  'ce-specversion': '1.0',
  'ce-id': '1',
  'ce-source': SOURCE,
  'ce-type': TYPE,
  'ce-datacontenttype': 'application/json',
  'ce-dataschema': DATASCHEMA,
  'ce-subject': 'sub',
  'ce-time': TIME,
};

describe('Header binding', () => {
  describe('writeBinary', () => {
    test('should keep extension types', () => {
      const { headers, body } = writeBinary(V1_WITH_JSON_DATA_WITH_EXT, { prefix: 'ce-' });

      expect(headers).toEqual({ ...EXPECTED_HEADERS, 'ce-astring': 'aaa', 'ce-aboolean': true, 'ce-anumber': 10 });
      expect(body).toEqual(DATA_JSON_SERIALIZED);
    });

    test('should write extensions as strings for text-only transports', () => {
      const { headers } = writeBinary(V1_WITH_JSON_DATA_WITH_EXT, { prefix: 'ce-', stringOnly: true });

      expect(headers).toEqual({ ...EXPECTED_HEADERS, 'ce-astring': 'aaa', 'ce-aboolean': 'true', 'ce-anumber': '10' });
    });

    test('should leave out the body of an event without data', () => {
      expect(writeBinary(V1_MIN)).toEqual({
        headers: { specversion: '1.0', id: '1', source: SOURCE, type: TYPE },
      });
    });
  });

  describe('Round trips', () => {
    test.each<NamedEvent>(allEvents())('should rebuild %s from typed headers', (_name, event) => {
      const { headers, body } = writeBinary(event, { prefix: 'ce-' });

      expect(readMessage({ headers, body, prefix: 'ce-' }).toEvent().equals(event)).toBe(true);
    });

    test.each<NamedEvent>(allEventsWithStringExtensions())('should rebuild %s from string headers', (_name, event) => {
      const { headers, body } = writeBinary(event, { prefix: 'ce-', stringOnly: true });

      expect(readMessage({ headers, body, prefix: 'ce-' }).toEvent().equals(event)).toBe(true);
    });

    test('should degrade extensions to strings through a text-only transport', () => {
      const { headers, body } = writeBinary(V1_WITH_JSON_DATA_WITH_EXT, { prefix: 'ce-', stringOnly: true });
      const event = readMessage({ headers, body, prefix: 'ce-' }).toEvent();

      expect(event.equals(V1_WITH_JSON_DATA_WITH_EXT_STRING)).toBe(true);
      expect(event.getExtension('aboolean')).toBe('true');
    });
  });

  describe('detectEncoding', () => {
    test('should detect structured content types', () => {
      expect(detectEncoding({ headers: {}, contentType: 'application/cloudevents+json; charset=utf-8' })).toBe(
        Encoding.STRUCTURED
      );
    });

    test('should detect a specversion header', () => {
      expect(detectEncoding({ headers: { 'CE-SpecVersion': '1.0' }, prefix: 'ce-', contentType: 'text/plain' })).toBe(
        Encoding.BINARY
      );
    });

    test('should report anything else as unknown', () => {
      expect(detectEncoding({ headers: { 'content-type': 'text/plain' }, prefix: 'ce-' })).toBe(Encoding.UNKNOWN);
      expect(detectEncoding({ headers: { 'ce-specversion': undefined }, prefix: 'ce-' })).toBe(Encoding.UNKNOWN);
    });
  });

  describe('readMessage', () => {
    const headers = { 'ce-specversion': '1.0', 'ce-id': '1', 'ce-source': SOURCE, 'ce-type': TYPE };

    test('should match header names case-insensitively', () => {
      const event = readMessage({
        headers: { 'Ce-SpecVersion': '1.0', 'Ce-Id': '1', 'Ce-Source': SOURCE, 'Ce-Type': TYPE },
        prefix: 'ce-',
      }).toEvent();

      expect(event.equals(V1_MIN)).toBe(true);
    });

    test('should fall back to the transport content type', () => {
      const event = readMessage({ headers, body: Buffer.from('{}'), contentType: 'application/json', prefix: 'ce-' }).toEvent();

      expect(event.getDataContentType()).toBe('application/json');
    });

    test('should ignore headers that are not event headers', () => {
      const event = readMessage({
        headers: { ...headers, 'content-length': '2', 'ce-x-custom': 'y', 'x-trace': 'z' },
        prefix: 'ce-',
      }).toEvent();

      expect(event.getExtensionNames()).toEqual([]);
    });

    test('should read byte header values as strings', () => {
      const event = readMessage({ headers: { ...headers, 'ce-traceparent': Buffer.from('00-trace-span-01') }, prefix: 'ce-' }).toEvent();

      expect(event.getExtension('traceparent')).toBe('00-trace-span-01');
    });

    test('should reject extension headers of an unsupported type', () => {
      const message = readMessage({ headers: { ...headers, 'ce-o': { nested: true } }, prefix: 'ce-' });

      expect(() => message.toEvent()).toThrow(UnsupportedExtensionTypeError);
    });

    test('should reject attribute headers that are not strings', () => {
      const message = readMessage({ headers: { ...headers, 'ce-id': 1 }, prefix: 'ce-' });

      expect(() => message.toEvent()).toThrow(InvalidAttributeError);
    });

    test('should reject an unknown spec version', () => {
      const message = readMessage({ headers: { ...headers, 'ce-specversion': '2.0' }, prefix: 'ce-' });

      expect(() => message.toEvent()).toThrow(UnrecognizedSpecVersionError);
    });

    test('should fail on a binary message without specversion', () => {
      const message = new HeadersBinaryMessage({ headers: { 'ce-id': '1' }, prefix: 'ce-' });

      expect(() => message.toEvent()).toThrow(IllegalStateError);
    });

    test('should read structured payloads with a registered format', () => {
      const body = new JsonFormat().serialize(V1_WITH_JSON_DATA);
      const message = readMessage({ headers: {}, body, contentType: 'application/cloudevents+json' });

      expect(message.getEncoding()).toBe(Encoding.STRUCTURED);
      expect(message.toEvent().equals(V1_WITH_JSON_DATA)).toBe(true);
    });

    test('should treat unregistered structured formats as unknown', () => {
      const body = new CsvFormat().serialize(V1_WITH_JSON_DATA);

      expect(readMessage({ headers: {}, body, contentType: 'application/cloudevents+csv' }).getEncoding()).toBe(
        Encoding.UNKNOWN
      );

      const registry = new FormatRegistry([new CsvFormat()]);
      const message = readMessage({ headers: {}, body, contentType: 'application/cloudevents+csv' }, registry);
      expect(message.toEvent().equals(V1_WITH_JSON_DATA)).toBe(true);
    });
  });

  describe('structuredToBinary', () => {
    test('should move data to the body and attributes to headers', () => {
      const format = new JsonFormat();
      const { headers, body } = structuredToBinary(format, format.serialize(V1_WITH_JSON_DATA_WITH_EXT), { prefix: 'ce-' });

      expect(headers).toEqual({ ...EXPECTED_HEADERS, 'ce-astring': 'aaa', 'ce-aboolean': true, 'ce-anumber': 10 });
      expect(Buffer.from(body ?? []).toString('utf8')).toBe('{}');
    });

    test('should fail when the payload carries no data', () => {
      const format = new JsonFormat();

      expect(() => structuredToBinary(format, format.serialize(V1_MIN))).toThrow(MissingDataError);
      expect(() => structuredToBinary(format, format.serialize(V1_MIN))).toThrow('data must not be null');
    });
  });
});
