export * from './errors.js'
export * from './log.js'
export * from './config.js'
export * from './components/index.js'
export * from './boards/index.js'
export * from './backends/backend.js'
export * from './backends/environment.js'
export * from './backends/console/index.js'
export * from './backends/hardware/index.js'
export * from './transport/usb.js'
export * from './transport/serial.js'
