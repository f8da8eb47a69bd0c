/**
 * AnimatedSize - Component Tests
 *
 * jsdom does no layout, so every measured height is 0.
 */

import { describe, it, expect } from 'vitest';
import { render, screen } from '@testing-library/react';
import { AnimatedSize } from './AnimatedSize';

describe('AnimatedSize', () => {
    it('renders its children inside a clipping container', () => {
        const { container } = render(
            <AnimatedSize duration={0.2} className="rounded-xl">
                <p>Content</p>
            </AnimatedSize>
        );

        const clip = container.firstElementChild;
        expect(clip?.classList.contains('overflow-hidden')).toBe(true);
        expect(clip?.classList.contains('rounded-xl')).toBe(true);
        expect(screen.getByText('Content')).toBeTruthy();
    });

    it('measures its content on mount', () => {
        const { container } = render(
            <AnimatedSize duration={0.2}>
                <p>Content</p>
            </AnimatedSize>
        );

        expect(container.firstElementChild?.getAttribute('data-measured-height')).toBe('0');
    });
});
