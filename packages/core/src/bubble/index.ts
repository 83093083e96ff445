export * from "./layout"
export * from "./BubblePositioner"
