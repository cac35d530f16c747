import { CloudEvent, CloudEventBuilder } from '../../src';

export const ID = '1';
export const TYPE = 'mock.test';
export const SOURCE = 'http://localhost/source';
export const DATACONTENTTYPE_JSON = 'application/json';
export const DATACONTENTTYPE_XML = 'application/xml';
export const DATACONTENTTYPE_TEXT = 'text/plain';
export const DATASCHEMA = 'http://localhost/schema';
export const SUBJECT = 'sub';
export const TIME = '2018-04-26T14:48:09+02:00';

export const DATA_JSON_SERIALIZED = Buffer.from('{}');
export const DATA_XML_SERIALIZED = Buffer.from('<stuff></stuff>');
export const DATA_TEXT_SERIALIZED = Buffer.from('Hello World!');

export const V1_MIN = CloudEventBuilder.v1()
  .withId(ID)
  .withType(TYPE)
  .withSource(SOURCE)
  .build();

export const V1_WITH_JSON_DATA = CloudEventBuilder.v1()
  .withId(ID)
  .withType(TYPE)
  .withSource(SOURCE)
  .withData(DATA_JSON_SERIALIZED, DATACONTENTTYPE_JSON, DATASCHEMA)
  .withSubject(SUBJECT)
  .withTime(TIME)
  .build();

export const V1_WITH_JSON_DATA_WITH_EXT = CloudEventBuilder.v1()
  .withId(ID)
  .withType(TYPE)
  .withSource(SOURCE)
  .withData(DATA_JSON_SERIALIZED, DATACONTENTTYPE_JSON, DATASCHEMA)
  .withSubject(SUBJECT)
  .withTime(TIME)
  .withExtension('astring', 'aaa')
  .withExtension('aboolean', true)
  .withExtension('anumber', 10)
  .build();

export const V1_WITH_JSON_DATA_WITH_EXT_STRING = CloudEventBuilder.v1()
  .withId(ID)
  .withType(TYPE)
  .withSource(SOURCE)
  .withData(DATA_JSON_SERIALIZED, DATACONTENTTYPE_JSON, DATASCHEMA)
  .withSubject(SUBJECT)
  .withTime(TIME)
  .withExtension('astring', 'aaa')
  .withExtension('aboolean', 'true')
  .withExtension('anumber', '10')
  .build();

export const V1_WITH_XML_DATA = CloudEventBuilder.v1()
  .withId(ID)
  .withType(TYPE)
  .withSource(SOURCE)
  .withData(DATA_XML_SERIALIZED, DATACONTENTTYPE_XML)
  .withSubject(SUBJECT)
  .withTime(TIME)
  .build();

export const V1_WITH_TEXT_DATA = CloudEventBuilder.v1()
  .withId(ID)
  .withType(TYPE)
  .withSource(SOURCE)
  .withData(DATA_TEXT_SERIALIZED, DATACONTENTTYPE_TEXT)
  .withSubject(SUBJECT)
  .withTime(TIME)
  .build();

export const V03_MIN = V1_MIN.toV03();
export const V03_WITH_JSON_DATA = V1_WITH_JSON_DATA.toV03();
export const V03_WITH_JSON_DATA_WITH_EXT = V1_WITH_JSON_DATA_WITH_EXT.toV03();
export const V03_WITH_JSON_DATA_WITH_EXT_STRING = V1_WITH_JSON_DATA_WITH_EXT_STRING.toV03();
export const V03_WITH_XML_DATA = V1_WITH_XML_DATA.toV03();
export const V03_WITH_TEXT_DATA = V1_WITH_TEXT_DATA.toV03();

export type NamedEvent = [string, CloudEvent];

export function v1Events(): NamedEvent[] {
  return [
    ['V1_MIN', V1_MIN],
    ['V1_WITH_JSON_DATA', V1_WITH_JSON_DATA],
    ['V1_WITH_JSON_DATA_WITH_EXT', V1_WITH_JSON_DATA_WITH_EXT],
    ['V1_WITH_XML_DATA', V1_WITH_XML_DATA],
    ['V1_WITH_TEXT_DATA', V1_WITH_TEXT_DATA],
  ];
}

export function v03Events(): NamedEvent[] {
  return [
    ['V03_MIN', V03_MIN],
    ['V03_WITH_JSON_DATA', V03_WITH_JSON_DATA],
    ['V03_WITH_JSON_DATA_WITH_EXT', V03_WITH_JSON_DATA_WITH_EXT],
    ['V03_WITH_XML_DATA', V03_WITH_XML_DATA],
    ['V03_WITH_TEXT_DATA', V03_WITH_TEXT_DATA],
  ];
}

export function allEvents(): NamedEvent[] {
  return [...v1Events(), ...v03Events()];
}

export function allEventsWithoutExtensions(): NamedEvent[] {
  return allEvents().filter(([, event]) => event.getExtensionNames().length === 0);
}

export function allEventsWithStringExtensions(): NamedEvent[] {
  return allEvents().map(([name, event]): NamedEvent => {
    const builder = CloudEventBuilder.fromEvent(event);
    for (const extension of event.getExtensionNames()) {
      builder.withExtension(extension, String(event.getExtension(extension)));
    }
    return [`${name}_STRING_EXT`, builder.build()];
  });
}
