import { describe, expect, it } from '@jest/globals';
import { parse as parseYaml } from 'yaml';
import { renderCrds } from './crd';

describe('renderCrds', () => {
  it('should render both custom resource definitions as one YAML stream', () => {
    const documents = renderCrds()
      .split('---\n')
      .map(document => parseYaml(document));

    expect(documents).toHaveLength(2);
    expect(documents[0]).toMatchObject({
      apiVersion: 'apiextensions.k8s.io/v1',
      kind: 'CustomResourceDefinition',
      metadata: { name: 'mcppools.mcpfleet.dev' }
    });
    expect(documents[1]).toMatchObject({
      kind: 'CustomResourceDefinition',
      metadata: { name: 'mcpservers.mcpfleet.dev' }
    });
  });
});
