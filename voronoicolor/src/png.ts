import sharp from "sharp"
import { RasterImage } from "./render"

function toSharp(image: RasterImage): sharp.Sharp {
    let pixels = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength)
    return sharp(pixels, { raw: { width: image.width, height: image.height, channels: 4 } }).png()
}

export function encodePng(image: RasterImage): Promise<Buffer> {
    return toSharp(image).toBuffer()
}

export async function writePng(image: RasterImage, path: string): Promise<void> {
    await toSharp(image).toFile(path)
}
