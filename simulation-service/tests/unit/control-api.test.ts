import { describe, it, expect, beforeEach } from 'vitest'
import request from 'supertest'
import express from 'express'
import { NetworkSimulator } from '@dgram-chat/shared'
import { createControlApp } from '../../src/routes/control'

describe('Control API', () => {
  let network: NetworkSimulator
  let app: express.Application

  beforeEach(() => {
    network = new NetworkSimulator({ packetLossRate: 0.1, minLatency: 10, maxLatency: 50 })
    app = createControlApp(network)
  })

  it('should report health', async () => {
    const response = await request(app)
      .get('/health')
      .expect(200)

    expect(response.body).toEqual({ status: 'ok', service: 'simulation-service' })
  })

  it('should return the current network config', async () => {
    const response = await request(app)
      .get('/api/network-config')
      .expect(200)

    expect(response.body).toEqual({
      packetLossRate: 0.1,
      duplicateRate: 0,
      minLatency: 10,
      maxLatency: 50,
      jitter: 0
    })
  })

  it('should return stats', async () => {
    const response = await request(app)
      .get('/api/stats')
      .expect(200)

    expect(response.body).toEqual({ packetsSent: 0, packetsDelivered: 0, packetsDropped: 0, packetsDuplicated: 0 })
  })

  describe('POST /api/network-config', () => {
    it('should apply a partial update', async () => {
      const response = await request(app)
        .post('/api/network-config')
        .send({ packetLossRate: 0.3, jitter: 5 })
        .expect(200)

      expect(response.body.success).toBe(true)
      expect(response.body.config).toEqual({
        packetLossRate: 0.3,
        duplicateRate: 0,
        minLatency: 10,
        maxLatency: 50,
        jitter: 5
      })
      expect(network.getConfig().packetLossRate).toBe(0.3)
    })

    it('should reject rates outside 0..1', async () => {
      const response = await request(app)
        .post('/api/network-config')
        .send({ packetLossRate: 1.5 })
        .expect(400)

      expect(response.body.error).toBe('Invalid network config')
      expect(network.getConfig().packetLossRate).toBe(0.1)
    })

    it('should reject unknown settings', async () => {
      await request(app)
        .post('/api/network-config')
        .send({ bandwidth: 1000 })
        .expect(400)
    })

    it('should reject a minimum latency above the maximum', async () => {
      const response = await request(app)
        .post('/api/network-config')
        .send({ minLatency: 80 })
        .expect(400)

      expect(response.body).toEqual({ error: 'minLatency cannot exceed maxLatency' })
      expect(network.getConfig().minLatency).toBe(10)
    })
  })
})
