import * as THREE from 'three';
import { SPRITES } from '../constants';

export type SpriteName = keyof typeof SPRITES;

export interface LoadedSprite {
    texture: THREE.Texture;
    size: number; // on-screen pixels
}

export type SpriteSet = Partial<Record<SpriteName, LoadedSprite>>;

export interface TextureSource {
    loadAsync: (url: string) => Promise<THREE.Texture>;
}

/**
 * Caches sprite loads by (path, size). A missing or broken image resolves to
 * null and is remembered, so the renderer falls back to plain circles
 * without retrying on every redraw.
 */
export class SpriteCache {
    private readonly entries = new Map<string, Promise<LoadedSprite | null>>();

    constructor(private readonly source: TextureSource = new THREE.TextureLoader()) {}

    load(path: string, size: number): Promise<LoadedSprite | null> {
        const key = `${path}@${size}`;
        const cached = this.entries.get(key);
        if (cached) return cached;

        const pending = this.source.loadAsync(path).then(
            (texture): LoadedSprite => ({ texture, size }),
            (error: unknown) => {
                console.warn(`[assets] could not load ${path}; drawing circles instead`, error);
                return null;
            },
        );
        this.entries.set(key, pending);
        return pending;
    }

    async loadAll(): Promise<SpriteSet> {
        const sprites: SpriteSet = {};
        const names: SpriteName[] = ['galaxy', 'star'];
        const loaded = await Promise.all(names.map((name) => this.load(SPRITES[name].path, SPRITES[name].size)));
        names.forEach((name, i) => {
            const sprite = loaded[i];
            if (sprite) sprites[name] = sprite;
        });
        return sprites;
    }

    get size(): number {
        return this.entries.size;
    }
}
