export interface LayerConfig {
  name: string;
  rarities?: number[];
  /** Ordered sub-type directories, each a single-key map of directory name to weights */
  types?: Array<Record<string, number[]>>;
  required?: boolean;
}

export type BackgroundColor = string | number[];

export interface CollectionConfig {
  layers: LayerConfig[];
  amount: number;
  id_from_one: boolean;
  token_prefix: string;
  description: string;
  uri_prefix: string;
  draw_background: boolean;
  canvas_width: number;
  canvas_height: number;
  background_color: BackgroundColor;
  rich_metadata: boolean;
  paintswap_metadata: boolean;
  assets_dir: string;
  output_dir: string;
  seed?: number | string;
  max_duplicate_retries: number;
}

export type CanvasConfig = Pick<
  CollectionConfig,
  'draw_background' | 'canvas_width' | 'canvas_height' | 'background_color'
>;

export type MetadataConfig = Pick<CollectionConfig, 'token_prefix' | 'description' | 'uri_prefix'>;

export interface BuildPaths {
  assetsDir: string;
  outputDir: string;
  imagesDir: string;
  jsonDir: string;
  statsDir: string;
}
