import type {
  ChunkingSettings,
  EmbeddingSettings,
  RuntimeSettings,
  SearchSettings,
} from "@kindex/types";

export interface RuntimeSettingsPatch {
  chunking?: Partial<ChunkingSettings>;
  embedding?: Partial<EmbeddingSettings>;
  search?: Partial<SearchSettings>;
}

export type SettingsSnapshot = Readonly<{
  chunking: Readonly<ChunkingSettings>;
  embedding: Readonly<EmbeddingSettings>;
  search: Readonly<SearchSettings>;
}>;

function freezeSettings(settings: RuntimeSettings): SettingsSnapshot {
  return Object.freeze({
    chunking: Object.freeze({
      ...settings.chunking,
      separators: Object.freeze([...settings.chunking.separators]),
    }),
    embedding: Object.freeze({ ...settings.embedding }),
    search: Object.freeze({ ...settings.search }),
  });
}

/**
 * Holds the runtime-mutable settings. Every operation takes one snapshot at its
 * start and uses it throughout, so an update never splits a run across two
 * configurations.
 */
export class SettingsStore {
  private current: SettingsSnapshot;

  constructor(initial: RuntimeSettings) {
    this.current = freezeSettings(initial);
  }

  snapshot(): SettingsSnapshot {
    return this.current;
  }

  update(patch: RuntimeSettingsPatch): SettingsSnapshot {
    const base = this.current;
    this.current = freezeSettings({
      chunking: {
        ...base.chunking,
        separators: [...base.chunking.separators],
        ...patch.chunking,
      },
      embedding: { ...base.embedding, ...patch.embedding },
      search: { ...base.search, ...patch.search },
    });
    return this.current;
  }
}
