/**
 * Widget area registry - populated by `register_widgets` callbacks.
 */

import { InvalidRegistrationError } from '../errors.js';

export interface WidgetArea {
  id: string;
  name: string;
  description?: string;
}

export class WidgetAreaRegistry {
  private areas: Map<string, WidgetArea> = new Map();

  register(area: WidgetArea): void {
    if (area.id.length === 0) {
      throw new InvalidRegistrationError('widget area id must not be empty');
    }
    if (this.areas.has(area.id)) {
      throw new InvalidRegistrationError(`widget area "${area.id}" is already registered`, { id: area.id });
    }
    this.areas.set(area.id, { ...area });
  }

  get(id: string): WidgetArea | undefined {
    return this.areas.get(id);
  }

  has(id: string): boolean {
    return this.areas.has(id);
  }

  list(): WidgetArea[] {
    return Array.from(this.areas.values());
  }
}
