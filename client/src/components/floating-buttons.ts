/**
 * floating-buttons.ts
 *
 * `<floating-buttons>` shows the back and scroll-to-top buttons once the
 * page is scrolled past a threshold.
 */

export const SCROLL_THRESHOLD = 200;

export function floatingDisplay(scrollY: number): 'flex' | 'none' {
    return scrollY > SCROLL_THRESHOLD ? 'flex' : 'none';
}

export class FloatingButtons extends HTMLElement {
    private onScroll = () => this.update(window.scrollY);

    connectedCallback() {
        window.addEventListener('scroll', this.onScroll, {passive: true});
        this.querySelector('#scroll-to-top-btn')?.addEventListener('click', () => {
            window.scrollTo({top: 0, behavior: 'smooth'});
        });
        this.update(window.scrollY);
    }

    disconnectedCallback() {
        window.removeEventListener('scroll', this.onScroll);
    }

    update(scrollY: number) {
        const display = floatingDisplay(scrollY);
        const container = this.querySelector<HTMLElement>('#floating-btns');
        if (container) container.style.display = display;
        for (const id of ['#scroll-to-top-btn', '#floating-back-btn']) {
            const button = this.querySelector<HTMLElement>(id);
            if (button) button.style.display = display === 'flex' ? 'inline-block' : 'none';
        }
    }
}

if (!customElements.get('floating-buttons')) {
    customElements.define('floating-buttons', FloatingButtons);
}
