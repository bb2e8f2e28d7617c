import React from 'react';
import Layout from './Layout.js';
import Notice from './Notice.js';

interface ErrorPageProps {
  title: string;
  message: string;
}

export default function ErrorPage({ title, message }: ErrorPageProps): React.JSX.Element {
  return (
    <Layout>
      <h2>{title}</h2>
      <Notice kind="error">{message}</Notice>
    </Layout>
  );
}
