import { appendSegment, joinPathList, segmentSatisfied, splitPathList } from '../../src/engine/path-list';

describe('Path lists', () => {
  test('splits and drops empty segments', () => {
    expect(splitPathList('/usr/bin::/bin:', ':')).toEqual(['/usr/bin', '/bin']);
    expect(splitPathList(undefined, ':')).toEqual([]);
  });

  test('joins with first occurrence winning', () => {
    expect(joinPathList(['/a', '/b', '/a', '', '/c'], ':')).toEqual('/a:/b:/c');
  });

  test('appends to an unset variable', () => {
    expect(appendSegment(undefined, '/opt/bin', ':')).toBe('/opt/bin');
  });

  test('appends without clobbering existing segments', () => {
    expect(appendSegment('/usr/bin:/bin', '/opt/bin', ':')).toBe('/usr/bin:/bin:/opt/bin');
  });

  test('leaves a present segment in place', () => {
    expect(appendSegment('/opt/bin:/usr/bin', '/opt/bin', ':')).toBe('/opt/bin:/usr/bin');
  });

  test('moves a segment that sits ahead of its anchor', () => {
    expect(appendSegment('/opt/bin:/usr/bin', '/opt/bin', ':', '/usr/bin')).toBe('/usr/bin:/opt/bin');
  });

  test('honors the separator', () => {
    expect(appendSegment('C:\\bin', 'D:\\tools', ';')).toBe('C:\\bin;D:\\tools');
  });

  test('checks position relative to an anchor', () => {
    expect(segmentSatisfied('/a:/b', '/b', ':', '/a')).toBe(true);
    expect(segmentSatisfied('/b:/a', '/b', ':', '/a')).toBe(false);
    expect(segmentSatisfied('/b', '/b', ':', '/a')).toBe(false);
    expect(segmentSatisfied('/a', '/b', ':')).toBe(false);
  });

  test('two appends compose in order', () => {
    const once = appendSegment('/usr/bin', '/opt/a', ':');
    expect(appendSegment(once, '/opt/b', ':')).toBe('/usr/bin:/opt/a:/opt/b');
  });
});
