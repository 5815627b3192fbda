/**
 * Client-side projections of the tenant business configuration document.
 *
 * The configuration endpoint returns the whole data model in one document;
 * these helpers cut it down to what each lookup tool reports.
 */

import { DATA_MODEL_OBJECT_TYPES, type DataModelObjectType } from '../constants.js';
import { asArray, asObjectArray, isPlainObject, type JsonObject } from './json.js';

type FieldSpec = ReadonlyArray<readonly [field: string, fallback: unknown]>;

/** Present keys keep their value, null included; absent keys take the fallback */
function project(source: JsonObject, fields: FieldSpec): JsonObject {
  const out: JsonObject = {};
  for (const [field, fallback] of fields) {
    out[field] = field in source ? source[field] : fallback;
  }
  return out;
}

const URI_LABEL_DESCRIPTION: FieldSpec = [
  ['uri', ''],
  ['label', ''],
  ['description', ''],
];

const DATA_MODEL_FIELDS: Record<DataModelObjectType, FieldSpec> = {
  entityTypes: URI_LABEL_DESCRIPTION,
  changeRequestTypes: [['uri', '']],
  relationTypes: URI_LABEL_DESCRIPTION,
  interactionTypes: [
    ['uri', ''],
    ['label', ''],
  ],
  graphTypes: [
    ['uri', ''],
    ['label', ''],
    ['relationshipTypeURIs', []],
  ],
  survivorshipStrategies: [
    ['uri', ''],
    ['label', ''],
  ],
  groupingTypes: [
    ['uri', ''],
    ['description', ''],
  ],
};

const ATTRIBUTE_FIELDS: FieldSpec = [
  ['label', ''],
  ['name', ''],
  ['description', ''],
  ['type', ''],
  ['required', false],
  ['searchable', false],
];

const METADATA_FIELDS: FieldSpec = [
  ['uri', ''],
  ['description', ''],
  ['schemaVersion', ''],
];

const AUDIT_FIELDS: FieldSpec = [
  ['label', ''],
  ['createdTime', ''],
  ['updatedTime', ''],
  ['createdBy', ''],
  ['updatedBy', ''],
];

export function summarizeBusinessConfig(config: JsonObject): JsonObject {
  return {
    uri: 'uri' in config ? config['uri'] : {},
    description: 'description' in config ? config['description'] : {},
    schemaVersion: 'schemaVersion' in config ? config['schemaVersion'] : {},
    sources: 'sources' in config ? config['sources'] : {},
  };
}

/** Identity fields plus the number of definitions of each kind */
export function summarizeTenantMetadata(config: JsonObject): JsonObject {
  const summary: JsonObject = {
    ...project(config, METADATA_FIELDS),
    sources: asArray(config['sources']).length,
    ...project(config, AUDIT_FIELDS),
  };
  for (const objectType of DATA_MODEL_OBJECT_TYPES) {
    summary[objectType] = asArray(config[objectType]).length;
  }
  return summary;
}

/**
 * Brief listing of each requested definition kind, in data-model order.
 * An empty request lists every kind.
 */
export function projectDataModel(
  config: JsonObject,
  objectTypes: readonly DataModelObjectType[]
): JsonObject {
  const out: JsonObject = {};
  for (const objectType of DATA_MODEL_OBJECT_TYPES) {
    if (objectTypes.length > 0 && !objectTypes.includes(objectType)) continue;
    out[objectType] = asObjectArray(config[objectType]).map((definition) =>
      project(definition, DATA_MODEL_FIELDS[objectType])
    );
  }
  return out;
}

function findByUri(definitions: unknown, uri: string): JsonObject | undefined {
  return asObjectArray(definitions).find((definition) => definition['uri'] === uri);
}

function attributesOf(definition: JsonObject, fields: FieldSpec = ATTRIBUTE_FIELDS): JsonObject[] {
  return asObjectArray(definition['attributes']).map((attribute) => project(attribute, fields));
}

function objectTypeUri(endpoint: unknown): unknown {
  return isPlainObject(endpoint) && 'objectTypeURI' in endpoint ? endpoint['objectTypeURI'] : '';
}

export function entityTypeDefinition(config: JsonObject, uri: string): JsonObject {
  const definition = findByUri(config['entityTypes'], uri);
  if (!definition) return {};
  return { ...project(definition, URI_LABEL_DESCRIPTION), attributes: attributesOf(definition) };
}

export function changeRequestTypeDefinition(config: JsonObject, uri: string): JsonObject {
  const definition = findByUri(config['changeRequestTypes'], uri);
  return definition ? project(definition, [['uri', '']]) : {};
}

export function relationTypeDefinition(config: JsonObject, uri: string): JsonObject {
  const definition = findByUri(config['relationTypes'], uri);
  if (!definition) return {};
  return {
    ...project(definition, URI_LABEL_DESCRIPTION),
    startObject: objectTypeUri(definition['startObject']),
    endObject: objectTypeUri(definition['endObject']),
    attributes: attributesOf(definition),
  };
}

export function interactionTypeDefinition(config: JsonObject, uri: string): JsonObject {
  const definition = findByUri(config['interactionTypes'], uri);
  if (!definition) return {};
  return {
    ...project(definition, [
      ['uri', ''],
      ['label', ''],
    ]),
    memberTypes: asObjectArray(definition['memberTypes']).map((member) =>
      project(member, [['name', '']])
    ),
    attributes: attributesOf(definition, [
      ['label', ''],
      ['name', ''],
      ['type', ''],
    ]),
  };
}

export function graphTypeDefinition(config: JsonObject, uri: string): JsonObject {
  const definition = findByUri(config['graphTypes'], uri);
  return definition ? project(definition, DATA_MODEL_FIELDS.graphTypes) : {};
}

export function groupingTypeDefinition(config: JsonObject, uri: string): JsonObject {
  const definition = findByUri(config['groupingTypes'], uri);
  return definition
    ? project(definition, [
        ['uri', ''],
        ['description', ''],
        ['source', ''],
      ])
    : {};
}
