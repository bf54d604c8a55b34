/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

/**
 * Page template: the style asset goes straight into <style>,
 * the converted fragment unescaped into <body>
 */
export function getDefaultPageTemplate(): string {
  return `<!doctype html>
<html>
<head>
<meta charset="utf-8">
<title>{{title}}</title>
<style>{{{css}}}

img {
    max-width: 200px;
}
</style>
</head>
<body>
{{{content}}}
</body>
</html>
`;
}

/**
 * Index template: one row per page, in the order given
 */
export function getDefaultIndexTemplate(): string {
  return `<!doctype html>
<html>
<head>
<meta charset="utf-8">
<title>{{title}}</title>
<style>
    html, body {
        display: flex;
        align-items: center;
        justify-content: center;
        height: 100%;
        min-height: 100%;
        background-color: #222;
    }

    .container {
        display: flex;
        flex-direction: column;
        justify-content: center;
        align-items: center;
        min-width: 500px;
        height: 80%;
        margin: 0;
    }

    .row-item {
        display: flex;
        width: 100%;
        padding: 5px;
        justify-content: center;
    }

    a {
        text-decoration: none;
    }

    a, a:visited, a:hover, a:active {
        color: #fafafa;
    }

    a:hover {
        font-weight: bold;
    }
</style>
</head>
<body>
<div class="container">
{{#each pages}}
    <div class="row-item"><a href="{{url}}">{{title}}</a></div>
{{/each}}
</div>
</body>
</html>
`;
}
