export { Button, type ButtonProps } from './Button'
export { Input, Textarea, type InputProps, type TextareaProps } from './Input'
