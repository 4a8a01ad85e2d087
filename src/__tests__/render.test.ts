import { createCanvas, loadImage, type Image } from '@napi-rs/canvas'
import { Renderer, composeFrame, formatTime, type DisplayPanel, type Frame, type View } from '../render'

async function solidImage(w: number, h: number, color: string): Promise<Image> {
  const c = createCanvas(w, h)
  const ctx = c.getContext('2d')
  ctx.fillStyle = color
  ctx.fillRect(0, 0, w, h)
  return loadImage(c.toBuffer('image/png'))
}

function pixel(frame: Frame, x: number, y: number): [number, number, number] {
  const i = (y * frame.width + x) * 3
  return [frame.rgb[i], frame.rgb[i + 1], frame.rgb[i + 2]]
}

const view = (over: Partial<View> = {}): View => ({
  state: { status: 'playing', trackIndex: 0, volume: 50 },
  track: { path: '/music/a.mp3', name: 'a.mp3' },
  position: { elapsedSec: 12.7, durationSec: 180.2 },
  artwork: null,
  ...over,
})

describe('composeFrame', () => {
  it('produces an RGB888 buffer of the panel size', () => {
    const frame = composeFrame(view(), 240, 240)
    expect(frame.width).toBe(240)
    expect(frame.height).toBe(240)
    expect(frame.rgb.length).toBe(240 * 240 * 3)
  })

  it('falls back to a black background without artwork', () => {
    const frame = composeFrame(view(), 240, 240)
    expect(pixel(frame, 220, 30)).toEqual([0, 0, 0])
    expect(pixel(frame, 239, 239)).toEqual([0, 0, 0])
  })

  it('draws square artwork over the whole panel at 30% brightness', async () => {
    const frame = composeFrame(view({ artwork: await solidImage(10, 10, 'rgb(255,0,0)') }), 240, 240)
    const [r, g, b] = pixel(frame, 220, 30)

    expect(r).toBeGreaterThanOrEqual(70)
    expect(r).toBeLessThanOrEqual(85)
    expect(g).toBe(0)
    expect(b).toBe(0)
  })

  it('letterboxes wide artwork', async () => {
    // 20x10 scales to 240x120, centred at y 60..180
    const frame = composeFrame(view({ artwork: await solidImage(20, 10, 'rgb(0,0,255)') }), 240, 240)

    expect(pixel(frame, 220, 30)).toEqual([0, 0, 0])
    expect(pixel(frame, 220, 200)).toEqual([0, 0, 0])
    const [, , b] = pixel(frame, 220, 100)
    expect(b).toBeGreaterThanOrEqual(70)
    expect(b).toBeLessThanOrEqual(85)
  })
})

describe('formatTime', () => {
  it('shows whole seconds', () => {
    expect(formatTime({ elapsedSec: 12.7, durationSec: 180.2 })).toBe('Time: 12s / 180s')
  })
})

describe('Renderer', () => {
  it('pushes one composed frame per render', async () => {
    const frames: Frame[] = []
    const panel: DisplayPanel = {
      push: async (f) => {
        frames.push(f)
      },
      close: async () => {},
    }
    const renderer = new Renderer(panel, 120, 80)

    await renderer.render(view())
    await renderer.render(view({ state: { status: 'paused', trackIndex: 0, volume: 50 } }))

    expect(frames).toHaveLength(2)
    expect(frames[0].rgb.length).toBe(120 * 80 * 3)
  })
})
