import { Effect } from "effect"
import type { Point, Rect, Size } from "@deskpet/shared"
import {
  InMemorySettingsStore,
  MonospaceTextMeasurer,
  PetEventBus,
  StaticScreenGeometry,
  VirtualTimeDriver,
  createPetController,
  defaultPetConfig,
  type AnimationLoader,
  type AnimationSurface,
  type BubbleFrame,
  type BubbleSurface,
  type PetConfigData,
  type PetController,
  type PetEvents,
  type RandomSource,
  type WindowSurface,
} from "../src"

export const MONITOR: Rect = { x: 0, y: 0, width: 1000, height: 800 }
export const FRAME: Size = { width: 100, height: 80 }

// ============================================================================
// Fakes
// ============================================================================

export class RecordingWindowSurface implements WindowSurface {
  readonly moves: Point[] = []
  readonly sizes: Size[] = []
  shown = 0
  hidden = 0

  move(x: number, y: number): void {
    this.moves.push({ x, y })
  }

  resize(width: number, height: number): void {
    this.sizes.push({ width, height })
  }

  show(): void {
    this.shown++
  }

  hide(): void {
    this.hidden++
  }
}

export class RecordingBubbleSurface implements BubbleSurface {
  readonly frames: BubbleFrame[] = []
  hidden = 0
  failWith: Error | null = null

  render(frame: BubbleFrame): void {
    if (this.failWith) throw this.failWith
    this.frames.push(frame)
  }

  hide(): void {
    this.hidden++
  }

  get last(): BubbleFrame | undefined {
    return this.frames[this.frames.length - 1]
  }
}

export class FakeAnimation implements AnimationSurface {
  playing = false
  speed: number | null = null
  rendered: Size | null = null

  constructor(
    readonly path: string,
    private readonly frameSize: Size | null
  ) {}

  start(): void {
    this.playing = true
  }

  stop(): void {
    this.playing = false
  }

  currentFrameSize(): Size | null {
    return this.frameSize
  }

  setPlaybackSpeedPercent(percent: number): void {
    this.speed = percent
  }

  setRenderedSize(size: Size): void {
    this.rendered = size
  }
}

export class FakeLoader implements AnimationLoader {
  readonly opened = new Map<string, FakeAnimation>()

  constructor(
    private readonly missing: ReadonlySet<string> = new Set(),
    private readonly frameSizes: ReadonlyMap<string, Size | null> = new Map()
  ) {}

  exists(path: string): boolean {
    return !this.missing.has(path)
  }

  open(path: string): FakeAnimation {
    const size = this.frameSizes.has(path) ? (this.frameSizes.get(path) ?? null) : FRAME
    const animation = new FakeAnimation(path, size)
    this.opened.set(path, animation)
    return animation
  }

  /** Paths of the animations currently playing. */
  playing(): string[] {
    return [...this.opened.values()].filter((a) => a.playing).map((a) => a.path)
  }
}

/**
 * Hands out the queued values in order, then `fallback` forever.
 */
export class ScriptedRandom implements RandomSource {
  private readonly values: number[]

  constructor(
    values: readonly number[] = [],
    private readonly fallback = 0.99
  ) {
    this.values = [...values]
  }

  next(): number {
    return this.values.shift() ?? this.fallback
  }
}

// ============================================================================
// Harness
// ============================================================================

/** Every timed behavior off, so a test turns on only what it exercises. */
export const QUIET_SETTINGS: Readonly<Record<string, unknown>> = {
  chatter_enabled: false,
  rest_enabled: false,
  auto_roundtrip_enabled: false,
}

export const ASSETS_DIR = "/pet-assets"

export interface HarnessOptions {
  readonly settings?: Readonly<Record<string, unknown>>
  readonly config?: Partial<PetConfigData>
  readonly rng?: RandomSource
  readonly monitors?: readonly Rect[]
  readonly loader?: FakeLoader
  readonly start?: boolean
}

export interface PetHarness {
  readonly pet: PetController
  readonly driver: VirtualTimeDriver
  readonly settings: InMemorySettingsStore
  readonly windowSurface: RecordingWindowSurface
  readonly bubbleSurface: RecordingBubbleSurface
  readonly loader: FakeLoader
  readonly events: PetEventBus
  /** Titles of every bubble shown, in order */
  readonly bubbleTitles: string[]
  readonly shown: PetEvents["bubble:shown"][]
}

export function buildPet(options: HarnessOptions = {}): PetHarness {
  const driver = new VirtualTimeDriver()
  const settings = new InMemorySettingsStore({ ...QUIET_SETTINGS, ...options.settings })
  const windowSurface = new RecordingWindowSurface()
  const bubbleSurface = new RecordingBubbleSurface()
  const loader = options.loader ?? new FakeLoader()
  const events = new PetEventBus()
  const shown: PetEvents["bubble:shown"][] = []
  const bubbleTitles: string[] = []
  events.on("bubble:shown", (payload) => {
    shown.push(payload)
    bubbleTitles.push(payload.title)
  })

  const pet = Effect.runSync(
    createPetController({
      config: defaultPetConfig({
        assetsDir: ASSETS_DIR,
        settingsFile: "/unused/settings.json",
        ...options.config,
      }),
      host: {
        screens: new StaticScreenGeometry(options.monitors ?? [MONITOR]),
        windowSurface,
        bubbleSurface,
        measurer: new MonospaceTextMeasurer(),
        loader,
      },
      settings,
      queue: driver.queue,
      clock: driver.clock,
      rng: options.rng ?? new ScriptedRandom(),
      events,
    })
  )

  if (options.start ?? true) pet.start()

  return {
    pet,
    driver,
    settings,
    windowSurface,
    bubbleSurface,
    loader,
    events,
    bubbleTitles,
    shown,
  }
}
