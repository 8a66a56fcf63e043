/**
 * @fileoverview CustomResourceDefinition manifests for MCPPool and MCPServer
 */

import {
  API_GROUP,
  API_VERSION,
  DEFAULT_IDLE_TIMEOUT_SECONDS,
  DEFAULT_MAX_SERVERS,
  DEFAULT_POOL_NAME,
  DEFAULT_SSE_PORT,
  POOL_KIND,
  POOL_PLURAL,
  SERVER_KIND,
  SERVER_PLURAL
} from '@mcpfleet/core';

/**
 * OpenAPI v3 schema in its wire form, as `kubectl apply` expects it
 */
export interface JsonSchema {
  readonly type: 'object' | 'array' | 'string' | 'integer';
  readonly required?: readonly string[];
  readonly properties?: Readonly<Record<string, JsonSchema>>;
  readonly items?: JsonSchema;
  readonly enum?: readonly string[];
  readonly default?: string | number;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly 'x-kubernetes-preserve-unknown-fields'?: boolean;
}

export interface PrinterColumn {
  readonly name: string;
  readonly type: 'integer' | 'string' | 'date';
  readonly jsonPath: string;
}

export interface CustomResourceDefinition {
  readonly apiVersion: 'apiextensions.k8s.io/v1';
  readonly kind: 'CustomResourceDefinition';
  readonly metadata: { readonly name: string };
  readonly spec: {
    readonly group: string;
    readonly scope: 'Namespaced';
    readonly names: {
      readonly kind: string;
      readonly plural: string;
      readonly singular: string;
      readonly shortNames: readonly string[];
    };
    readonly versions: ReadonlyArray<{
      readonly name: string;
      readonly served: boolean;
      readonly storage: boolean;
      readonly subresources: { readonly status: Record<string, never> };
      readonly additionalPrinterColumns: readonly PrinterColumn[];
      readonly schema: { readonly openAPIV3Schema: JsonSchema };
    }>;
  };
}

const envSchema: JsonSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['name', 'value'],
    properties: {
      name: { type: 'string' },
      value: { type: 'string' }
    }
  }
};

const transportSchema: JsonSchema = {
  type: 'object',
  required: ['type'],
  properties: {
    type: { type: 'string', enum: ['stdio', 'sse'] },
    port: { type: 'integer', minimum: 1, maximum: 65535, default: DEFAULT_SSE_PORT }
  }
};

const statusSchema: JsonSchema = {
  type: 'object',
  'x-kubernetes-preserve-unknown-fields': true
};

const poolSpecSchema: JsonSchema = {
  type: 'object',
  required: ['template'],
  properties: {
    maxServers: { type: 'integer', minimum: 1, default: DEFAULT_MAX_SERVERS },
    idleTimeout: { type: 'integer', minimum: 0, default: DEFAULT_IDLE_TIMEOUT_SECONDS },
    template: {
      type: 'object',
      required: ['image'],
      properties: {
        image: { type: 'string' },
        command: { type: 'array', items: { type: 'string' } },
        args: { type: 'array', items: { type: 'string' } },
        env: envSchema,
        resources: { type: 'object', 'x-kubernetes-preserve-unknown-fields': true },
        transport: transportSchema
      }
    }
  }
};

const serverSpecSchema: JsonSchema = {
  type: 'object',
  properties: {
    pool: { type: 'string', default: DEFAULT_POOL_NAME },
    image: { type: 'string' },
    transport: transportSchema,
    env: envSchema,
    idleTimeout: { type: 'integer', minimum: 0 }
  }
};

function definition(
  kind: string,
  plural: string,
  shortName: string,
  spec: JsonSchema,
  columns: readonly PrinterColumn[]
): CustomResourceDefinition {
  return {
    apiVersion: 'apiextensions.k8s.io/v1',
    kind: 'CustomResourceDefinition',
    metadata: { name: `${plural}.${API_GROUP}` },
    spec: {
      group: API_GROUP,
      scope: 'Namespaced',
      names: {
        kind,
        plural,
        singular: kind.toLowerCase(),
        shortNames: [shortName]
      },
      versions: [
        {
          name: API_VERSION,
          served: true,
          storage: true,
          subresources: { status: {} },
          additionalPrinterColumns: columns,
          schema: {
            openAPIV3Schema: {
              type: 'object',
              required: ['spec'],
              properties: { spec, status: statusSchema }
            }
          }
        }
      ]
    }
  };
}

export function poolDefinition(): CustomResourceDefinition {
  return definition(POOL_KIND, POOL_PLURAL, 'mcpp', poolSpecSchema, [
    { name: 'Max', type: 'integer', jsonPath: '.spec.maxServers' },
    { name: 'Active', type: 'integer', jsonPath: '.status.activeServers' },
    { name: 'Pending', type: 'integer', jsonPath: '.status.pendingServers' },
    { name: 'Age', type: 'date', jsonPath: '.metadata.creationTimestamp' }
  ]);
}

export function serverDefinition(): CustomResourceDefinition {
  return definition(SERVER_KIND, SERVER_PLURAL, 'mcps', serverSpecSchema, [
    { name: 'Pool', type: 'string', jsonPath: '.spec.pool' },
    { name: 'Phase', type: 'string', jsonPath: '.status.phase' },
    { name: 'Requests', type: 'integer', jsonPath: '.status.totalRequests' },
    { name: 'Age', type: 'date', jsonPath: '.metadata.creationTimestamp' }
  ]);
}

export function customResourceDefinitions(): CustomResourceDefinition[] {
  return [poolDefinition(), serverDefinition()];
}
