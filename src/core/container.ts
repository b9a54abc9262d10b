/**
 * Container: a Model that owns a rectangle and shares it among its children.
 *
 *   class Split extends Container {
 *     static direction: Direction = 'row';
 *     static children = [child(Sidebar), child(Main, undefined, 3)];
 *   }
 *
 * The rectangle is read from the reserved state keys `width`, `height`, `x`
 * and `y`, which are removed from `state`. Each child receives its share as
 * those same keys, overriding anything its mapper produced. Geometry is
 * fixed at construction; `with({ width, height })` builds a resized copy.
 */

import { createBounds, type Bounds } from './bounds.js';
import { distributeBounds, type Direction } from './layout.js';
import { Model, type ChildDefinition } from './model.js';
import { screenSize } from './screen.js';
import type { StateInput } from './state.js';

export class Container extends Model {
  /** Main layout axis. Subclasses replace this. */
  static direction: Direction = 'column';

  /** The rectangle this container occupies. */
  declare readonly bounds: Bounds;

  /** Containers are layout shells unless a subclass renders something. */
  view(): string {
    return this.childrenViews();
  }

  /** Like `Model#with`, keeping the current bounds unless `partial` sets them. */
  with(partial: StateInput = {}): Model {
    return super.with({ ...this.bounds, ...partial });
  }

  protected absorbState(input: StateInput): StateInput {
    const { width, height, x, y, ...rest } = input;
    const needsScreen = typeof width !== 'number' || typeof height !== 'number';
    const screen = needsScreen ? screenSize() : null;

    Object.defineProperty(this, 'bounds', {
      value: createBounds({
        width: typeof width === 'number' ? width : screen?.width,
        height: typeof height === 'number' ? height : screen?.height,
        x: typeof x === 'number' ? x : 0,
        y: typeof y === 'number' ? y : 0,
      }),
      enumerable: true,
    });

    return rest;
  }

  protected buildChildren(definitions: readonly ChildDefinition[]): Model[] {
    const slots = distributeBounds(
      this.bounds,
      definitions.map((d) => d.weight),
      this.direction(),
    );

    return definitions.map((definition, i) => {
      const Child = this.resolveChild(definition.selector);
      return new Child({ ...definition.mapper(this.state), ...slots[i] });
    });
  }

  /** The layout direction declared on this container's class. */
  protected direction(): Direction {
    const direction: unknown = Reflect.get(this.constructor, 'direction');
    return direction === 'row' ? 'row' : 'column';
  }
}
