import type blessed from 'blessed';

export abstract class BaseView {
  protected screen: blessed.Widgets.Screen | null = null;
  abstract mount(screen: blessed.Widgets.Screen): void;
  abstract unmount(): void;

  protected render(): void {
    this.screen?.render();
  }
}
