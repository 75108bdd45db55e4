/**
 * @jest-environment jsdom
 */
import { DomRangeTarget, DomTextTarget } from '../DomTargets';

describe('DomTextTarget', () => {
    it('writes text and clears it for null', () => {
        const element = document.createElement('div');
        const target = new DomTextTarget(element);

        target.setText('Hello');
        expect(element.textContent).toBe('Hello');

        target.setText(null);
        expect(element.textContent).toBe('');
    });

    it('toggles visibility without removing the element from layout', () => {
        const element = document.createElement('div');
        const target = new DomTextTarget(element);

        target.setVisible(false);
        expect(element.style.visibility).toBe('hidden');
        expect(element.style.display).toBe('');

        target.setVisible(true);
        expect(element.style.visibility).toBe('');
    });
});

describe('DomRangeTarget', () => {
    it('writes max and value to a range input', () => {
        const input = document.createElement('input');
        input.type = 'range';
        const target = new DomRangeTarget(input);

        target.setMax(180_000);
        target.setValue(5000);

        expect(input.max).toBe('180000');
        expect(input.value).toBe('5000');
    });

    it('hides the range', () => {
        const input = document.createElement('input');
        input.type = 'range';
        const target = new DomRangeTarget(input);

        target.setVisible(false);

        expect(input.style.visibility).toBe('hidden');
    });
});
