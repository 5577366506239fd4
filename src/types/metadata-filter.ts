/** Metadata fields a filter can target */
export const MetadataField = {
  Track: 'track',
  Album: 'album',
  Artist: 'artist',
  AlbumArtist: 'albumArtist',
} as const;
export type MetadataField = (typeof MetadataField)[keyof typeof MetadataField];

export const METADATA_FIELDS: readonly MetadataField[] = Object.values(MetadataField);
