/**
 * Atlas metadata handed to the serializers. One Texture per packed bin.
 */
export interface Atlas {
  textures: Texture[];
}

export interface Texture {
  name: string;
  images: AtlasImage[];
}

export interface AtlasImage {
  name: string;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Negated trim offset of the packed pixels inside the original frame. */
  frameX: number;
  frameY: number;
  /** Untrimmed source dimensions. */
  frameWidth: number;
  frameHeight: number;
  rotated: boolean;
}
