import _ from 'lodash';

interface LoDashMixins extends _.LoDashStatic {
  equalsTo<T> (x: T): (y: T) => boolean;
  contains<T> (lst: readonly T[], item: unknown): item is T;
}

let equalsTo = <T>(x: T) => (y: T) => _.isEqual(x, y);

_.mixin({
  equalsTo: equalsTo,
  contains: <T>(lst: readonly T[], item: unknown) => _.some(lst, equalsTo<unknown>(item)),
});

export default <LoDashMixins>_;
