export type LibraryProgressEvent =
  | { kind: 'api-request'; url: string }
  | { kind: 'podcasts-start' }
  | { kind: 'podcasts-done'; count: number }
  | { kind: 'podcast-start'; slug: string }
  | { kind: 'podcast-skipped'; title: string; reason: string }
  | { kind: 'podcast-failed'; slug: string; error: unknown }
  | { kind: 'episode-start'; slug: string; episodeNumber: number }
  | { kind: 'episode-done'; slug: string; episodeNumber: number; linkCount: number }
  | { kind: 'episode-failed'; slug: string; episodeNumber: number; error: unknown }

export type ProgressHandler = ((event: LibraryProgressEvent) => void) | null
