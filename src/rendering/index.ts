import { InteractiveRenderer } from "./interactive.js"
import { PlainRenderer } from "./plain.js"
import type { CliRenderer, RendererMode } from "./types.js"

export * from "./types.js"

export const defaultRendererMode = (): RendererMode => (process.stdout.isTTY ? "interactive" : "plain")

export const createRenderer = (mode: RendererMode = defaultRendererMode()): CliRenderer => {
  if (mode === "plain") {
    return new PlainRenderer()
  }
  return new InteractiveRenderer()
}
