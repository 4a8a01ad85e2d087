import { ButtonInput, bindButtons, type InputLine } from '../buttons'
import { StartupError } from '../errors'
import { BUTTON_LABELS, type PlayerEvent } from '../types'

class FakeLine implements InputLine {
  onEdge: (() => void) | null = null
  released = false

  constructor(readonly id: number) {}

  watch(onEdge: () => void): void {
    this.onEdge = onEdge
  }

  release(): void {
    this.released = true
  }

  edge(): void {
    this.onEdge?.()
  }
}

function setup() {
  const lines = new Map<number, FakeLine>()
  const events: PlayerEvent[] = []
  let now = 10_000
  const input = new ButtonInput(bindButtons([5, 6, 16, 24], BUTTON_LABELS), (ev) => events.push(ev), 250, () => now)
  input.start((id) => {
    const line = new FakeLine(id)
    lines.set(id, line)
    return line
  })

  const line = (id: number): FakeLine => {
    const l = lines.get(id)
    if (!l) throw new Error(`no line ${id}`)
    return l
  }
  const advance = (ms: number) => {
    now += ms
  }
  return { input, lines, line, events, advance }
}

describe('ButtonInput', () => {
  it('maps each line to its label', () => {
    const { line, events } = setup()
    line(5).edge()
    line(6).edge()
    line(16).edge()
    line(24).edge()

    expect(events).toEqual([
      { type: 'button', label: 'play-pause' },
      { type: 'button', label: 'next' },
      { type: 'button', label: 'volume-down' },
      { type: 'button', label: 'volume-up' },
    ])
  })

  it('collapses edges on one line within 250 ms', () => {
    const { line, events, advance } = setup()
    line(5).edge()
    advance(40)
    line(5).edge()
    advance(209)
    line(5).edge()

    expect(events).toHaveLength(1)

    advance(1)
    line(5).edge()
    expect(events).toHaveLength(2)
  })

  it('debounces each line on its own', () => {
    const { line, events, advance } = setup()
    line(5).edge()
    advance(10)
    line(6).edge()

    expect(events.map((e) => (e.type === 'button' ? e.label : e.type))).toEqual(['play-pause', 'next'])
  })

  it('releases every line on stop', () => {
    const { input, lines } = setup()
    input.stop()
    expect([...lines.values()].every((l) => l.released)).toBe(true)
  })

  it('fails startup when a line cannot be configured', () => {
    const opened: FakeLine[] = []
    const input = new ButtonInput(bindButtons([5, 6, 16, 24], BUTTON_LABELS), () => {}, 250)

    expect(() =>
      input.start((id) => {
        if (id === 16) throw new Error('EACCES')
        const l = new FakeLine(id)
        opened.push(l)
        return l
      }),
    ).toThrow(StartupError)
    expect(opened.map((l) => l.released)).toEqual([true, true])
  })
})

describe('bindButtons', () => {
  it('requires one pin per label', () => {
    expect(() => bindButtons([5, 6], BUTTON_LABELS)).toThrow('Expected 4 button pins, got 2')
  })
})
