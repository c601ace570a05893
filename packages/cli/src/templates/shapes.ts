export const shapesTemplate = `version: "0.1"
canvas:
  width: 20
  height: 15
  background: transparent

frames:
  - id: line
    label: "Line (stroke)"
    shapes:
      - type: line
        from: [-1, -2]
        to: [1, 1]
        stroke: { color: white }

  - id: circle
    label: "Circle (stroke + fill)"
    shapes:
      - type: circle
        center: [1, 1]
        radius: 4
        fill: { color: red }
        stroke: { color: white }

  - id: square
    label: "Square (fill)"
    shapes:
      - type: square
        center: [-1, 0]
        side: 6
        fill: { color: red }

  - id: rectangle
    label: "Rectangle (stroke + fill)"
    shapes:
      - type: rectangle
        center: [5, 3]
        width: 7
        height: 8
        fill: { color: green }
        stroke: { color: white }

  - id: triangle
    label: "Triangle (stroke + fill)"
    shapes:
      - type: triangle
        points: [[0, -2], [0, 2], [8, 3]]
        fill: { color: blue }
        stroke: { color: white }

  - id: equilateral
    label: "Equilateral triangle (stroke)"
    shapes:
      - type: equilateral-triangle
        center: [-1, 1]
        side: 9
        stroke: { color: green }
`;
