import { OptionsVisitor } from '../../src/OptionsVisitor';
import { ListDecoder } from '../../src/decoders/ListDecoder';
import { IntegerDecoder } from '../../src/decoders/IntegerDecoder';
import { StringDecoder } from '../../src/decoders/StringDecoder';
import { StructDecoder } from '../../src/decoders/StructDecoder';
import type { RawOption } from '../../src/RawOption';
import { InvalidParameterValueError, MissingParameterError } from '../../src/errors';

function opened(...options: RawOption[]): OptionsVisitor {
  const visitor = new OptionsVisitor({ options });
  visitor.beginStruct();
  return visitor;
}

describe('ListDecoder', () => {
  it('decodes repeated occurrences', () => {
    const visitor = opened({ name: 'host', value: 'a' }, { name: 'host', value: 'b' });
    expect(new ListDecoder(new StringDecoder()).decode(visitor, 'host')).toEqual(['a', 'b']);
    expect(visitor.listMode).toBe('none');
    expect(() => visitor.endStruct()).not.toThrow();
  });

  it('expands integer ranges', () => {
    const visitor = opened({ name: 'cpus', value: '0-3' }, { name: 'cpus', value: '8' });
    const decoder = new ListDecoder(new IntegerDecoder('unsigned'));
    expect(decoder.decode(visitor, 'cpus')).toEqual([0n, 1n, 2n, 3n, 8n]);
  });

  it('fails on an absent name', () => {
    const visitor = opened();
    expect(() => new ListDecoder(new StringDecoder()).decode(visitor, 'host')).toThrow(MissingParameterError);
    expect(visitor.listMode).toBe('none');
  });

  it('closes the list when an element fails', () => {
    const visitor = opened({ name: 'n', value: '1' }, { name: 'n', value: 'x' });
    expect(() => new ListDecoder(new IntegerDecoder()).decode(visitor, 'n')).toThrow(InvalidParameterValueError);
    expect(visitor.listMode).toBe('none');
  });

  it('decodes single-member struct elements', () => {
    const visitor = opened({ name: 'cpus', value: '0-2' });
    const decoder = new ListDecoder(
      new StructDecoder({ fields: [{ name: 'value', decoder: new IntegerDecoder('unsigned') }] }),
    );
    expect(decoder.decode(visitor, 'cpus')).toEqual([{ value: 0n }, { value: 1n }, { value: 2n }]);
    expect(visitor.depth).toBe(1);
    expect(() => visitor.endStruct()).not.toThrow();
  });

  it('exposes its item decoder', () => {
    const item = new StringDecoder();
    expect(new ListDecoder(item).itemDecoder).toBe(item);
  });
});
