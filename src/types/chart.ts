/**
 * 图表数据类型
 */

export type BarOrientation = "vertical" | "horizontal"

/**
 * 单根柱子
 */
export interface BarDatum {
  label: string
  value: number
  /** 柱子上标注的文字 */
  annotation: string
  color: string
}

/**
 * 柱状图描述（与绘制无关的纯数据）
 */
export interface BarChartSpec {
  title: string
  /** 数值轴标题 */
  axisLabel: string
  orientation: BarOrientation
  bars: BarDatum[]
  width: number
  height: number
}

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

/**
 * 布局后的柱子
 */
export interface BarLayout {
  bar: BarDatum
  rect: Rect
  /** 分类标签位置 */
  labelAnchor: { x: number; y: number }
  /** 数值标注位置 */
  annotationAnchor: { x: number; y: number }
}

export interface ChartPadding {
  top: number
  right: number
  bottom: number
  left: number
}
