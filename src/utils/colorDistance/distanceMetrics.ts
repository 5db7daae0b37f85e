// Color distance metrics

import { hexToLab } from './colorConversion'
import { Color, LABTuple, YUVTuple } from './types'

/**
 * Euclidean distance in YUV space, the metric clustering runs on
 */
export function yuvDistance(p1: YUVTuple, p2: YUVTuple): number {
  return Math.sqrt(
    Math.pow(p2[0] - p1[0], 2) +
    Math.pow(p2[1] - p1[1], 2) +
    Math.pow(p2[2] - p1[2], 2)
  )
}

const DEG = Math.PI / 180
const POW25_7 = Math.pow(25, 7)

function hueAngle(b: number, a: number): number {
  if (a === 0 && b === 0) return 0
  const h = Math.atan2(b, a) / DEG
  return h >= 0 ? h : h + 360
}

/**
 * CIEDE2000 color difference (Sharma, Wu & Dalal 2005) with kL = kC = kH = 1.
 * 0 = identical, about 2.3 = just noticeable, 100 = black vs white
 */
export function deltaE2000(lab1: LABTuple, lab2: LABTuple): number {
  const [L1, a1, b1] = lab1
  const [L2, a2, b2] = lab2

  const C1 = Math.hypot(a1, b1)
  const C2 = Math.hypot(a2, b2)
  const cBar7 = Math.pow((C1 + C2) / 2, 7)
  const G = 0.5 * (1 - Math.sqrt(cBar7 / (cBar7 + POW25_7)))

  const a1p = (1 + G) * a1
  const a2p = (1 + G) * a2
  const C1p = Math.hypot(a1p, b1)
  const C2p = Math.hypot(a2p, b2)
  const h1p = hueAngle(b1, a1p)
  const h2p = hueAngle(b2, a2p)
  const chromaProduct = C1p * C2p

  const dLp = L2 - L1
  const dCp = C2p - C1p
  let dhp = 0
  if (chromaProduct !== 0) {
    dhp = h2p - h1p
    if (dhp > 180) dhp -= 360
    else if (dhp < -180) dhp += 360
  }
  const dHp = 2 * Math.sqrt(chromaProduct) * Math.sin((dhp / 2) * DEG)

  const lBarP = (L1 + L2) / 2
  const cBarP = (C1p + C2p) / 2
  let hBarP = h1p + h2p
  if (chromaProduct !== 0) {
    if (Math.abs(h1p - h2p) > 180) {
      hBarP += hBarP < 360 ? 360 : -360
    }
    hBarP /= 2
  }

  const T = 1
    - 0.17 * Math.cos((hBarP - 30) * DEG)
    + 0.24 * Math.cos(2 * hBarP * DEG)
    + 0.32 * Math.cos((3 * hBarP + 6) * DEG)
    - 0.20 * Math.cos((4 * hBarP - 63) * DEG)

  const dTheta = 30 * Math.exp(-Math.pow((hBarP - 275) / 25, 2))
  const cBarP7 = Math.pow(cBarP, 7)
  const Rc = 2 * Math.sqrt(cBarP7 / (cBarP7 + POW25_7))
  const lOffset = Math.pow(lBarP - 50, 2)
  const Sl = 1 + (0.015 * lOffset) / Math.sqrt(20 + lOffset)
  const Sc = 1 + 0.045 * cBarP
  const Sh = 1 + 0.015 * cBarP * T
  const Rt = -Math.sin(2 * dTheta * DEG) * Rc

  const l = dLp / Sl
  const c = dCp / Sc
  const h = dHp / Sh
  return Math.sqrt(Math.max(0, l * l + c * c + h * h + Rt * c * h))
}

/**
 * Perceptual distance between two hex colors (CIEDE2000 over D65 LAB)
 */
export function perceptualDistance(color1: Color, color2: Color): number {
  return deltaE2000(hexToLab(color1), hexToLab(color2))
}

/**
 * Similarity in (0, 1], 1 for identical colors
 */
export function similarity(distance: number): number {
  return 1 / (1 + distance)
}
