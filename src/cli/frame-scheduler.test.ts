import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { FrameScheduler } from './frame-scheduler'

describe('FrameScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('renders once per frame however often it is asked', () => {
    const render = vi.fn()
    const scheduler = new FrameScheduler(render, 33)

    for (let i = 0; i < 100; i++) scheduler.request()
    expect(render).not.toHaveBeenCalled()
    expect(scheduler.pending).toBe(true)

    vi.advanceTimersByTime(33)
    expect(render).toHaveBeenCalledTimes(1)
    expect(scheduler.pending).toBe(false)
  })

  it('schedules a new frame after rendering', () => {
    const render = vi.fn()
    const scheduler = new FrameScheduler(render, 10)

    scheduler.request()
    vi.advanceTimersByTime(10)
    scheduler.request()
    vi.advanceTimersByTime(10)

    expect(render).toHaveBeenCalledTimes(2)
  })

  it('renders immediately on flush and drops the pending frame', () => {
    const render = vi.fn()
    const scheduler = new FrameScheduler(render, 10)

    scheduler.request()
    scheduler.flush()
    expect(render).toHaveBeenCalledTimes(1)

    vi.advanceTimersByTime(50)
    expect(render).toHaveBeenCalledTimes(1)
  })

  it('does nothing after cancel', () => {
    const render = vi.fn()
    const scheduler = new FrameScheduler(render, 10)

    scheduler.request()
    scheduler.cancel()
    vi.advanceTimersByTime(50)

    expect(render).not.toHaveBeenCalled()
  })

  it('survives a failing render', () => {
    const render = vi.fn(() => {
      throw new Error('boom')
    })
    const scheduler = new FrameScheduler(render, 10)

    scheduler.request()
    vi.advanceTimersByTime(10)
    scheduler.request()
    vi.advanceTimersByTime(10)

    expect(render).toHaveBeenCalledTimes(2)
  })
})
