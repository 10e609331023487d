import { TIMING } from '../../config/constants.js';
import { BrowserElement } from '../adapters/BrowserElement.js';
import { BrowserPage } from '../adapters/BrowserPage.js';

export type RandomSource = () => number;

/**
 * Types into a field one character at a time with a random pause between
 * keystrokes, then settles briefly before moving on.
 */
export class HumanInput {
    constructor(
        private page: BrowserPage,
        private random: RandomSource = Math.random
    ) { }

    keystrokeDelay(): number {
        const { KEYSTROKE_DELAY_MIN: min, KEYSTROKE_DELAY_MAX: max } = TIMING;
        return Math.round(min + this.random() * (max - min));
    }

    async type(field: BrowserElement, text: string): Promise<void> {
        await field.fill('');
        await field.click();
        for (const char of text) {
            await this.page.keyboardType(char);
            await this.page.waitForTimeout(this.keystrokeDelay());
        }
        await this.page.waitForTimeout(TIMING.FIELD_SETTLE_DELAY);
    }
}
