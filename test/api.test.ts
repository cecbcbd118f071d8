import { describe, expect, it } from 'vitest'

import Api from '../src/utils/api.js'
import { ApiError, HttpStatusError } from '../src/utils/errors.js'
import { fakeFetch, jsonResponse, ok } from './helpers.js'

const variant = (id: number, bandwidth: number, backupUrl: string[] | null) => ({
  id,
  bandwidth,
  mimeType: 'video/mp4',
  baseUrl: `https://cdn.test/${id}`,
  backupUrl,
  codecs: 'avc1.640032',
})

describe('Api', () => {
  it('sends the cookie and referer with every request', async () => {
    const fake = fakeFetch(() => ok({ bvid: 'BV1', aid: 1, cid: 2, title: 'B', owner: { mid: 3, name: 'A' } }))
    const api = new Api({ cookies: 'SESSDATA=test-secret', fetchFn: fake.fetchFn })

    await api.getVideoInfo('BV1')

    expect(fake.inits[0]?.headers).toMatchObject({ Referer: 'https://www.bilibili.com', Cookie: 'SESSDATA=test-secret' })
  })

  it('leaves the cookie out when logged out', () => {
    expect(new Api().headers).not.toHaveProperty('Cookie')
  })

  it('reads video info', async () => {
    const fake = fakeFetch(() => ok({ bvid: 'BV1', aid: 1, cid: 2, title: 'B', owner: { mid: 3, name: 'A' }, extra: true }))
    const api = new Api({ fetchFn: fake.fetchFn })

    const info = await api.getVideoInfo('BV1')

    expect(info).toEqual({ bvid: 'BV1', aid: 1, cid: 2, title: 'B', owner: { mid: 3, name: 'A' } })
    expect(fake.calls[0]?.pathname).toBe('/x/web-interface/view')
    expect(fake.calls[0]?.searchParams.get('bvid')).toBe('BV1')
  })

  it('reads the stream variants', async () => {
    const fake = fakeFetch(() =>
      ok({
        result: 'suee',
        dash: { video: [variant(80, 300, ['https://backup.test/80']), variant(64, 200, null)], audio: null },
      }),
    )
    const api = new Api({ fetchFn: fake.fetchFn })

    const stream = await api.getVideoStream('BV1', 2)

    expect(stream.result).toBe('suee')
    expect(stream.dash.video).toEqual([
      { id: 80, bandwidth: 300, mimeType: 'video/mp4', baseUrl: 'https://cdn.test/80', backupUrl: ['https://backup.test/80'] },
      { id: 64, bandwidth: 200, mimeType: 'video/mp4', baseUrl: 'https://cdn.test/64', backupUrl: [] },
    ])
    expect(stream.dash.audio).toEqual([])

    const params = fake.calls[0]?.searchParams
    expect(params?.get('cid')).toBe('2')
    expect(params?.get('fnval')).toBe('16')
  })

  it('treats a missing dash block as no streams', async () => {
    const api = new Api({ fetchFn: fakeFetch(() => ok({})).fetchFn })

    await expect(api.getVideoStream('BV1', 2)).resolves.toEqual({ result: '', dash: { video: [], audio: [] } })
  })

  it('reads the watch later list', async () => {
    const api = new Api({
      fetchFn: fakeFetch(() => ok({ count: 1, list: [{ bvid: 'BV1', cid: 2, title: 'B', owner: { mid: 3, name: 'A' } }] })).fetchFn,
    })

    await expect(api.getToViewList()).resolves.toEqual([{ bvid: 'BV1', cid: 2, title: 'B', owner: { name: 'A' } }])
  })

  it('reads search sections', async () => {
    const fake = fakeFetch(() =>
      ok({
        result: [
          { result_type: 'user', data: [{ mid: 1 }] },
          { result_type: 'video', data: [{ bvid: 'BV1' }] },
        ],
      }),
    )
    const api = new Api({ fetchFn: fake.fetchFn })

    const sections = await api.search('cat', 2)

    expect(sections).toEqual([
      { resultType: 'user', data: [{ mid: 1 }] },
      { resultType: 'video', data: [{ bvid: 'BV1' }] },
    ])
    expect(fake.calls[0]?.searchParams.get('keyword')).toBe('cat')
    expect(fake.calls[0]?.searchParams.get('page')).toBe('2')
  })

  it('turns a non zero code into an ApiError', async () => {
    const api = new Api({ fetchFn: fakeFetch(() => jsonResponse({ code: -404, message: 'not found' })).fetchFn })

    const error = await api.getVideoInfo('BV1').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApiError)
    expect(error).toHaveProperty('apiCode', -404)
    expect(error).toHaveProperty('message', '/x/web-interface/view failed, code: -404, message: not found')
  })

  it('turns an error status into an HttpStatusError', async () => {
    const api = new Api({ fetchFn: fakeFetch(() => new Response('busy', { status: 503 })).fetchFn })

    const error = await api.getToViewList().catch((e: unknown) => e)

    expect(error).toBeInstanceOf(HttpStatusError)
    expect(error).toHaveProperty('status', 503)
  })

  it('reads the login QR code', async () => {
    const fake = fakeFetch(() => ok({ url: 'https://passport.test/qr?key=k1', qrcode_key: 'k1' }))
    const api = new Api({ fetchFn: fake.fetchFn })

    await expect(api.getQrCode()).resolves.toEqual({ url: 'https://passport.test/qr?key=k1', qrcodeKey: 'k1' })
    expect(fake.calls[0]?.host).toBe('passport.bilibili.com')
  })

  it('polls the QR code state', async () => {
    const fake = fakeFetch(() => ok({ code: 86101, message: 'not scanned', url: '' }))
    const api = new Api({ fetchFn: fake.fetchFn })

    await expect(api.pollQrCode('k1')).resolves.toEqual({ code: 86101, message: 'not scanned', cookies: '' })
    expect(fake.calls[0]?.searchParams.get('qrcode_key')).toBe('k1')
  })

  it('keeps the name and value of every cookie', () => {
    const api = new Api()

    const cookies = api.collectCookies([
      'SESSDATA=test-secret; Path=/; Domain=bilibili.com; HttpOnly',
      'bili_jct=test-token; Path=/',
      'broken',
    ])

    expect(cookies).toBe('SESSDATA=test-secret; bili_jct=test-token')
  })
})
