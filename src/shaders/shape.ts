/**
 * Shape shaders: per-vertex color, optionally modulated by a texture
 */

export const shapeVertexShader = `#version 300 es
precision highp float;

in vec2 a_position;
in vec2 a_texcoord;
in vec4 a_color;

uniform mat3 u_matrix;

out vec2 v_texcoord;
out vec4 v_color;

void main() {
  vec3 pos = u_matrix * vec3(a_position, 1.0);
  gl_Position = vec4(pos.xy, 0.0, 1.0);
  v_texcoord = a_texcoord;
  v_color = a_color;
}
`;

export const shapeFragmentShader = `#version 300 es
precision mediump float;

in vec2 v_texcoord;
in vec4 v_color;

uniform sampler2D u_texture;
uniform bool u_useTexture;

out vec4 fragColor;

void main() {
  fragColor = u_useTexture ? texture(u_texture, v_texcoord) * v_color : v_color;
}
`;
