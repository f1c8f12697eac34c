import { describe, expect, it } from 'vitest';

import { MalformedArgsError } from '@zk-query/core';

import { parseTemplateVariables } from './templateVariables';

describe('parseTemplateVariables', () => {
  it('splits on the first equals sign and trims both sides', () => {
    expect(parseTemplateVariables([' project = apollo ', 'query=a=b', 'empty='])).toEqual({
      project: 'apollo',
      query: 'a=b',
      empty: '',
    });
  });

  it('lets later entries override earlier ones', () => {
    expect(parseTemplateVariables(['mood=calm', 'mood=busy'])).toEqual({ mood: 'busy' });
    expect(parseTemplateVariables()).toEqual({});
  });

  it('rejects entries without a name or separator', () => {
    expect(() => parseTemplateVariables(['flag'])).toThrow(
      new MalformedArgsError('Template variable must be name=value, got "flag"'),
    );
    expect(() => parseTemplateVariables(['=value'])).toThrow(MalformedArgsError);
    expect(() => parseTemplateVariables([''])).toThrow(MalformedArgsError);
  });
});
