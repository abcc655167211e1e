import {
  escapeHtml,
  looseEquals,
  renderOption,
  type OptionScalar,
} from '../option';

describe('renderOption', () => {
  it('selects when a numeric string matches a number', () => {
    expect(renderOption('1', 'One', 1)).toBe(
      '<option value="1" selected="selected">One</option>',
    );
  });

  it('does not select a different value', () => {
    expect(renderOption('1', 'One', '2')).toBe('<option value="1">One</option>');
  });

  it('escapes value and text', () => {
    expect(renderOption('a"b', '<b>&</b>', null)).toBe(
      '<option value="a&quot;b">&lt;b&gt;&amp;&lt;/b&gt;</option>',
    );
  });

  it('renders an empty placeholder selected when nothing is current', () => {
    expect(renderOption('', '- Select -', undefined)).toBe(
      '<option value="" selected="selected">- Select -</option>',
    );
  });
});

describe('looseEquals', () => {
  it.each<[OptionScalar, OptionScalar]>([
    ['1', 1],
    ['1.0', '1'],
    [' 2', 2],
    ['10', 10.0],
    [null, undefined],
    [null, ''],
    [true, '1'],
    [false, '0'],
    [false, null],
    ['abc', 'abc'],
  ])('%p equals %p', (a, b) => {
    expect(looseEquals(a, b)).toBe(true);
    expect(looseEquals(b, a)).toBe(true);
  });

  it.each<[OptionScalar, OptionScalar]>([
    ['1', 2],
    ['', 0],
    ['abc', 0],
    [null, 0],
    [true, '0'],
    ['abc', 'ABC'],
    ['1e1', 'x'],
  ])('%p does not equal %p', (a, b) => {
    expect(looseEquals(a, b)).toBe(false);
    expect(looseEquals(b, a)).toBe(false);
  });
});

describe('escapeHtml', () => {
  it('escapes single quotes', () => {
    expect(escapeHtml("it's")).toBe('it&#039;s');
  });
});
