import { beforeEach } from 'vitest'
import { Config } from '../../src/config.js'

beforeEach(() => {
  Config.resetForTest()
})
