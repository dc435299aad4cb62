import blessed from 'blessed';
import { EMPTY_LABEL } from '../../cycler.js';
import type { BlessedBox, BlessedButton, BlessedFactory, BlessedScreen, TuiComponentLifecycle } from '../types.js';

export interface NavBarComponentOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

/**
 * Bottom bar: previous / indicator / next, the settings button and a footer hint.
 */
export class NavBarComponent implements TuiComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private screen: BlessedScreen;
  private bar: BlessedBox;
  private prevButton: BlessedButton;
  private indicator: BlessedBox;
  private nextButton: BlessedButton;
  private settingsButton: BlessedButton;
  private footer: BlessedBox;
  private label = EMPTY_LABEL;

  constructor(options: NavBarComponentOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;

    this.bar = this.blessedImpl.box({
      parent: this.screen,
      bottom: 1,
      left: 0,
      width: '100%',
      height: 3,
      border: { type: 'line' },
      style: { border: { fg: 'cyan' } },
    });

    this.prevButton = this.blessedImpl.button({
      parent: this.bar,
      top: 0,
      left: 1,
      width: 5,
      height: 1,
      content: ' ◀ ',
      mouse: true,
      style: { fg: 'white', bg: 'blue', hover: { bg: 'cyan' } },
    });

    this.indicator = this.blessedImpl.box({
      parent: this.bar,
      top: 0,
      left: 7,
      width: 13,
      height: 1,
      align: 'center',
      content: this.label,
    });

    this.nextButton = this.blessedImpl.button({
      parent: this.bar,
      top: 0,
      left: 21,
      width: 5,
      height: 1,
      content: ' ▶ ',
      mouse: true,
      style: { fg: 'white', bg: 'blue', hover: { bg: 'cyan' } },
    });

    this.settingsButton = this.blessedImpl.button({
      parent: this.bar,
      top: 0,
      right: 1,
      width: 5,
      height: 1,
      content: ' ⚙ ',
      mouse: true,
      style: { fg: 'yellow', hover: { bg: 'grey' } },
    });

    this.footer = this.blessedImpl.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      height: 1,
      width: '100%',
      content: '←/→ cycle · e edit · p paste line · s settings · ? help · q quit',
      style: { fg: 'grey' },
    });
  }

  create(): this {
    return this;
  }

  onPrev(handler: () => void): void {
    this.prevButton.on('press', handler);
  }

  onNext(handler: () => void): void {
    this.nextButton.on('press', handler);
  }

  onSettings(handler: () => void): void {
    this.settingsButton.on('press', handler);
  }

  setLabel(label: string): void {
    this.label = label;
    this.indicator.setContent(label);
  }

  getLabel(): string {
    return this.label;
  }

  show(): void {
    this.bar.show();
    this.footer.show();
  }

  hide(): void {
    this.bar.hide();
    this.footer.hide();
  }

  focus(): void {
    this.nextButton.focus();
  }

  destroy(): void {
    for (const widget of [this.prevButton, this.nextButton, this.settingsButton]) {
      widget.removeAllListeners();
      widget.destroy();
    }
    this.indicator.destroy();
    this.bar.destroy();
    this.footer.destroy();
  }
}
