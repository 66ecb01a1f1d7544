import { describe, it, expect } from 'vitest';
import { ManualScheduler } from '@/test-utils';
import { Curves } from './curves';
import { DomScrollable } from './dom-scrollable';

function scrollableElement(scrollHeight: number, clientHeight: number): HTMLElement {
  const element = document.createElement('div');
  Object.defineProperty(element, 'scrollHeight', { value: scrollHeight, configurable: true });
  Object.defineProperty(element, 'clientHeight', { value: clientHeight, configurable: true });
  Object.defineProperty(element, 'scrollTop', { value: 0, writable: true, configurable: true });
  return element;
}

describe('DomScrollable', () => {
  it('is inert until attached', () => {
    const scrollable = new DomScrollable(new ManualScheduler());
    scrollable.jumpTo(100);
    expect(scrollable.offset).toBe(0);
    expect(scrollable.maxOffset).toBe(0);
  });

  it('jumps within the scrollable range', () => {
    const scrollable = new DomScrollable(new ManualScheduler());
    const element = scrollableElement(1000, 400);
    scrollable.attach(element);

    scrollable.jumpTo(250);
    expect(element.scrollTop).toBe(250);
    expect(scrollable.offset).toBe(250);
    expect(scrollable.isOutOfRange).toBe(false);
  });

  it('clamps and flags requests outside the range', () => {
    const scrollable = new DomScrollable(new ManualScheduler());
    scrollable.attach(scrollableElement(1000, 400));

    scrollable.jumpTo(900);
    expect(scrollable.offset).toBe(600);
    expect(scrollable.isOutOfRange).toBe(true);

    scrollable.jumpTo(-10);
    expect(scrollable.offset).toBe(0);
    expect(scrollable.isOutOfRange).toBe(true);

    scrollable.jumpTo(10);
    expect(scrollable.isOutOfRange).toBe(false);
  });

  it('animates over frames', () => {
    const scheduler = new ManualScheduler();
    const scrollable = new DomScrollable(scheduler);
    scrollable.attach(scrollableElement(1000, 400));
    scrollable.jumpTo(400);

    scrollable.animateTo(0, 200, Curves.linear);
    scheduler.advance(100);
    expect(scrollable.offset).toBe(200);

    scheduler.runFrames();
    expect(scrollable.offset).toBe(0);
    expect(scheduler.pendingFrames).toBe(0);
  });

  it('lets a jump interrupt an animation', () => {
    const scheduler = new ManualScheduler();
    const scrollable = new DomScrollable(scheduler);
    scrollable.attach(scrollableElement(1000, 400));

    scrollable.animateTo(500, 200, Curves.linear);
    scrollable.jumpTo(50);
    scheduler.runFrames();

    expect(scrollable.offset).toBe(50);
  });
});
