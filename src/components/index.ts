export * from './component.js'
export * from './led.js'
export * from './motor.js'
export * from './servo.js'
export * from './powerOutput.js'
export * from './batterySensor.js'
export * from './button.js'
export * from './piezo.js'
export * from './gpioPin.js'
export * from './stringCommand.js'
