import { errorObject } from './internal/error_object';
import { arrayObject } from './internal/exotic_array';
import { booleanObject, fundamental, numberObject, stringObject, symbolObject } from './internal/fundamental';
import { iterators } from './internal/iterators';
import { objectAndFunctionPrototype, objectConstructor, prelude } from './internal/prelude';
import { Plugin } from './internal/vm';

export const core: Plugin = {
  id: 'core',
  deps: () => [
    prelude,
    fundamental,
    errorObject,
    iterators,
    arrayObject,
  ],
};

export {
  objectAndFunctionPrototype,
  objectConstructor,
  prelude,
  booleanObject,
  symbolObject,
  numberObject,
  stringObject,
  fundamental,
  errorObject,
  iterators,
  arrayObject,
};
