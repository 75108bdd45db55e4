/**
 * @jest-environment jsdom
 */
import { ImageArtworkTarget } from '../ImageArtworkTarget';
import type { MediaMetadata } from '../../../playback/types';

const cover: MediaMetadata = {
    title: 'Cover Song',
    subtitle: 'Someone',
    artworkUri: 'https://example.com/cover.jpg',
};

describe('ImageArtworkTarget', () => {
    let image: HTMLImageElement;

    beforeEach(() => {
        image = document.createElement('img');
    });

    it('renders the artwork URI by default', async () => {
        const target = new ImageArtworkTarget(image);

        await target.render(cover);

        expect(image.getAttribute('src')).toBe('https://example.com/cover.jpg');
        expect(image.alt).toBe('Cover Song');
        expect(image.style.visibility).toBe('');
    });

    it('clears the image for null metadata', async () => {
        const target = new ImageArtworkTarget(image);
        await target.render(cover);

        await target.render(null);

        expect(image.hasAttribute('src')).toBe(false);
        expect(image.style.visibility).toBe('hidden');
    });

    it('clears the image when no URL resolves', async () => {
        const target = new ImageArtworkTarget(image);

        await target.render({ ...cover, artworkUri: null });

        expect(image.hasAttribute('src')).toBe(false);
        expect(image.style.visibility).toBe('hidden');
    });

    it('uses a custom resolver', async () => {
        const resolveArtworkUrl = jest.fn().mockResolvedValue('https://cdn.example.com/resolved.jpg');
        const target = new ImageArtworkTarget(image, { resolveArtworkUrl });

        await target.render(cover);

        expect(resolveArtworkUrl).toHaveBeenCalledWith(cover);
        expect(image.getAttribute('src')).toBe('https://cdn.example.com/resolved.jpg');
    });

    it('clears the image and rejects when the resolver fails', async () => {
        const target = new ImageArtworkTarget(image, {
            resolveArtworkUrl: jest.fn().mockRejectedValue(new Error('lookup failed')),
        });
        image.setAttribute('src', 'https://example.com/previous.jpg');

        await expect(target.render(cover)).rejects.toThrow('lookup failed');

        expect(image.hasAttribute('src')).toBe(false);
    });

    it('drops results of superseded requests', async () => {
        let resolveSlow: (url: string | null) => void = () => {};
        const resolveArtworkUrl = jest.fn((metadata: MediaMetadata) => {
            if (metadata.title === 'Slow') {
                return new Promise<string | null>((resolve) => {
                    resolveSlow = resolve;
                });
            }
            return Promise.resolve(metadata.artworkUri);
        });
        const target = new ImageArtworkTarget(image, { resolveArtworkUrl });

        const slow = target.render({ ...cover, title: 'Slow' });
        await target.render({ ...cover, artworkUri: 'https://example.com/fast.jpg' });
        resolveSlow('https://example.com/slow.jpg');
        await slow;

        expect(image.getAttribute('src')).toBe('https://example.com/fast.jpg');
    });

    it('resolves quietly when a superseded request fails', async () => {
        let rejectSlow: (error: Error) => void = () => {};
        const resolveArtworkUrl = jest.fn((metadata: MediaMetadata) => {
            if (metadata.title === 'Slow') {
                return new Promise<string | null>((_resolve, reject) => {
                    rejectSlow = reject;
                });
            }
            return Promise.resolve(metadata.artworkUri);
        });
        const target = new ImageArtworkTarget(image, { resolveArtworkUrl });

        const slow = target.render({ ...cover, title: 'Slow' });
        await target.render({ ...cover, artworkUri: 'https://example.com/fast.jpg' });
        rejectSlow(new Error('stale'));

        await expect(slow).resolves.toBeUndefined();
        expect(image.getAttribute('src')).toBe('https://example.com/fast.jpg');
        expect(image.style.visibility).toBe('');
    });

    it('clears the image when it fails to load', async () => {
        const target = new ImageArtworkTarget(image);
        await target.render(cover);

        image.dispatchEvent(new Event('error'));

        expect(image.hasAttribute('src')).toBe(false);
        expect(image.style.visibility).toBe('hidden');
    });

    it('stops listening for load errors after destroy', async () => {
        const target = new ImageArtworkTarget(image);
        await target.render(cover);

        target.destroy();
        image.dispatchEvent(new Event('error'));

        expect(image.getAttribute('src')).toBe('https://example.com/cover.jpg');
    });
});
