import { buildDescriptor, type EnumDescriptor } from '../src/core/descriptor.js';
import { typeId } from '../src/core/type-id.js';
import { IntegralKinds, type DescriptorOptions, type IntegralKind } from '../src/types/types.js';

export const describeType = (
  name: string,
  members: Array<[string, number | bigint]>,
  kind: IntegralKind = IntegralKinds.Int32,
  options?: DescriptorOptions
): EnumDescriptor =>
  buildDescriptor(
    typeId(name),
    members.map(([n, value]) => ({ name: n, value })),
    kind,
    options
  );

/** None=0, Left=1, Right=2, Top=4, Bottom=8 */
export const sides = (): EnumDescriptor =>
  describeType('Sides', [
    ['None', 0],
    ['Left', 1],
    ['Right', 2],
    ['Top', 4],
    ['Bottom', 8],
  ]);

/** Sides plus composite aliases. */
export const borderSides = (): EnumDescriptor =>
  describeType('BorderSides', [
    ['None', 0],
    ['Left', 1],
    ['Right', 2],
    ['Top', 4],
    ['Bottom', 8],
    ['LeftRight', 3],
    ['TopBottom', 12],
    ['All', 15],
  ]);

export const days = (): EnumDescriptor =>
  describeType('Days', [
    ['None', 0],
    ['Monday', 1],
    ['Tuesday', 2],
    ['Wednesday', 4],
    ['Thursday', 8],
    ['Friday', 16],
    ['Saturday', 32],
    ['Sunday', 64],
    ['Weekdays', 31],
    ['Weekend', 96],
    ['All', 127],
  ]);

/** Sequential enum whose low values happen to be powers of two. */
export const priority = (options?: DescriptorOptions): EnumDescriptor =>
  describeType(
    'Priority',
    [
      ['Low', 1],
      ['Medium', 2],
      ['High', 3],
      ['Critical', 4],
    ],
    IntegralKinds.Int32,
    options
  );
