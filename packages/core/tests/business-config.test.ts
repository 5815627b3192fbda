import { describe, expect, it } from 'vitest';
import {
  changeRequestTypeDefinition,
  entityTypeDefinition,
  graphTypeDefinition,
  groupingTypeDefinition,
  interactionTypeDefinition,
  projectDataModel,
  relationTypeDefinition,
  summarizeBusinessConfig,
  summarizeTenantMetadata,
} from '../src/utils/business-config.js';

const config = {
  uri: 'configuration',
  description: 'Test tenant',
  schemaVersion: '42',
  label: 'Test',
  createdTime: 1700000000000,
  createdBy: 'admin',
  sources: [{ uri: 'configuration/sources/Reltio' }, { uri: 'configuration/sources/CRM' }],
  entityTypes: [
    {
      uri: 'configuration/entityTypes/Individual',
      label: 'Individual',
      description: 'A person',
      attributes: [
        {
          uri: 'configuration/entityTypes/Individual/attributes/FirstName',
          label: 'First Name',
          name: 'FirstName',
          type: 'String',
          searchable: true,
        },
      ],
    },
  ],
  changeRequestTypes: [{ uri: 'configuration/changeRequestTypes/default', extra: true }],
  relationTypes: [
    {
      uri: 'configuration/relationTypes/Employment',
      label: 'Employment',
      startObject: { objectTypeURI: 'configuration/entityTypes/Individual' },
      endObject: { objectTypeURI: 'configuration/entityTypes/Organization' },
    },
  ],
  interactionTypes: [
    {
      uri: 'configuration/interactionTypes/Email',
      label: 'Email',
      memberTypes: [{ name: 'Sender', uri: 'configuration/interactionTypes/Email/memberTypes/Sender' }],
      attributes: [{ label: 'Subject', name: 'Subject', type: 'String', required: true }],
    },
  ],
  graphTypes: [
    {
      uri: 'configuration/graphTypes/Hierarchy',
      label: 'Hierarchy',
      relationshipTypeURIs: ['configuration/relationTypes/ReportsTo'],
    },
  ],
  groupingTypes: [
    { uri: 'configuration/groupingTypes/Household', description: 'Household', source: 'Reltio' },
  ],
};

describe('summaries', () => {
  it('summarizes the business configuration with object defaults', () => {
    expect(summarizeBusinessConfig({ uri: 'configuration' })).toEqual({
      uri: 'configuration',
      description: {},
      schemaVersion: {},
      sources: {},
    });
  });

  it('counts definitions in tenant metadata, in a fixed key order', () => {
    const summary = summarizeTenantMetadata(config);
    expect(summary).toEqual({
      uri: 'configuration',
      description: 'Test tenant',
      schemaVersion: '42',
      sources: 2,
      label: 'Test',
      createdTime: 1700000000000,
      updatedTime: '',
      createdBy: 'admin',
      updatedBy: '',
      entityTypes: 1,
      changeRequestTypes: 1,
      relationTypes: 1,
      interactionTypes: 1,
      graphTypes: 1,
      survivorshipStrategies: 0,
      groupingTypes: 1,
    });
    expect(Object.keys(summary).slice(0, 5)).toEqual([
      'uri',
      'description',
      'schemaVersion',
      'sources',
      'label',
    ]);
  });
});

describe('projectDataModel', () => {
  it('lists only the requested kinds', () => {
    expect(projectDataModel(config, ['graphTypes'])).toEqual({
      graphTypes: [
        {
          uri: 'configuration/graphTypes/Hierarchy',
          label: 'Hierarchy',
          relationshipTypeURIs: ['configuration/relationTypes/ReportsTo'],
        },
      ],
    });
  });

  it('lists every kind for an empty request', () => {
    const model = projectDataModel(config, []);
    expect(Object.keys(model)).toEqual([
      'entityTypes',
      'changeRequestTypes',
      'relationTypes',
      'interactionTypes',
      'graphTypes',
      'survivorshipStrategies',
      'groupingTypes',
    ]);
    expect(model['entityTypes']).toEqual([
      { uri: 'configuration/entityTypes/Individual', label: 'Individual', description: 'A person' },
    ]);
    expect(model['survivorshipStrategies']).toEqual([]);
  });
});

describe('type definitions', () => {
  it('describes an entity type with attribute defaults', () => {
    expect(entityTypeDefinition(config, 'configuration/entityTypes/Individual')).toEqual({
      uri: 'configuration/entityTypes/Individual',
      label: 'Individual',
      description: 'A person',
      attributes: [
        {
          label: 'First Name',
          name: 'FirstName',
          description: '',
          type: 'String',
          required: false,
          searchable: true,
        },
      ],
    });
  });

  it('reports start and end object types of a relation type', () => {
    expect(relationTypeDefinition(config, 'configuration/relationTypes/Employment')).toEqual({
      uri: 'configuration/relationTypes/Employment',
      label: 'Employment',
      description: '',
      startObject: 'configuration/entityTypes/Individual',
      endObject: 'configuration/entityTypes/Organization',
      attributes: [],
    });
  });

  it('reports member types of an interaction type', () => {
    expect(interactionTypeDefinition(config, 'configuration/interactionTypes/Email')).toEqual({
      uri: 'configuration/interactionTypes/Email',
      label: 'Email',
      memberTypes: [{ name: 'Sender' }],
      attributes: [{ label: 'Subject', name: 'Subject', type: 'String' }],
    });
  });

  it('projects change request, graph and grouping types', () => {
    expect(changeRequestTypeDefinition(config, 'configuration/changeRequestTypes/default')).toEqual({
      uri: 'configuration/changeRequestTypes/default',
    });
    expect(graphTypeDefinition(config, 'configuration/graphTypes/Hierarchy')).toEqual({
      uri: 'configuration/graphTypes/Hierarchy',
      label: 'Hierarchy',
      relationshipTypeURIs: ['configuration/relationTypes/ReportsTo'],
    });
    expect(groupingTypeDefinition(config, 'configuration/groupingTypes/Household')).toEqual({
      uri: 'configuration/groupingTypes/Household',
      description: 'Household',
      source: 'Reltio',
    });
  });

  it('returns an empty object for an unknown type', () => {
    expect(entityTypeDefinition(config, 'configuration/entityTypes/Missing')).toEqual({});
    expect(groupingTypeDefinition({}, 'configuration/groupingTypes/Household')).toEqual({});
  });
});
