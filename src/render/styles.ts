export const PAGE_STYLES = `
* {
  margin: 0;
  padding: 0;
  box-sizing: border-box;
}

body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif;
  background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
  min-height: 100vh;
  padding: 20px;
}

.container {
  max-width: 1200px;
  margin: 0 auto;
}

header {
  text-align: center;
  color: white;
  margin-bottom: 30px;
}

h1 {
  font-size: 2.5rem;
  margin-bottom: 10px;
  text-shadow: 2px 2px 4px rgba(0, 0, 0, 0.3);
}

.subtitle {
  font-size: 1.2rem;
  opacity: 0.9;
  margin-bottom: 5px;
}

.last-update {
  font-size: 0.9rem;
  opacity: 0.8;
  margin-top: 10px;
  padding: 8px 16px;
  background: rgba(255, 255, 255, 0.2);
  border-radius: 20px;
  display: inline-block;
}

.search-container {
  background: white;
  border-radius: 10px;
  padding: 20px;
  margin-bottom: 20px;
  box-shadow: 0 10px 30px rgba(0, 0, 0, 0.2);
}

.search-box {
  width: 100%;
  padding: 15px;
  font-size: 1rem;
  border: 2px solid #e0e0e0;
  border-radius: 8px;
  outline: none;
  transition: border-color 0.3s;
}

.search-box:focus {
  border-color: #667eea;
}

.stats {
  text-align: center;
  color: #666;
  margin-top: 10px;
  font-size: 0.9rem;
}

.episodes-list {
  background: white;
  border-radius: 10px;
  overflow: hidden;
  box-shadow: 0 10px 30px rgba(0, 0, 0, 0.2);
}

.episode {
  border-bottom: 1px solid #e0e0e0;
  padding: 20px;
}

.episode:last-child {
  border-bottom: none;
}

.episode-header {
  margin-bottom: 15px;
}

.episode-meta {
  display: flex;
  flex-wrap: wrap;
  gap: 10px;
  align-items: center;
  margin-bottom: 8px;
}

.podcast-badge,
.episode-number {
  color: white;
  padding: 4px 12px;
  border-radius: 20px;
  font-size: 0.85rem;
}

.podcast-badge {
  background: #764ba2;
  font-weight: 500;
}

.episode-number {
  background: #667eea;
  font-weight: bold;
}

.episode-date {
  color: #666;
  font-size: 0.85rem;
}

.episode-title {
  font-size: 1.1rem;
  font-weight: 600;
  color: #333;
  margin: 8px 0;
}

.episode-title a {
  color: #333;
  text-decoration: none;
  transition: color 0.2s;
}

.episode-title a:hover {
  color: #667eea;
}

.links-section {
  display: flex;
  flex-direction: column;
  gap: 8px;
}

.link-item {
  display: flex;
  align-items: center;
  padding: 10px 15px;
  background: #f8f9fa;
  border-radius: 8px;
  text-decoration: none;
  color: #333;
  transition: all 0.2s;
  border-left: 3px solid #667eea;
}

.link-item:hover {
  background: #e9ecef;
  transform: translateX(5px);
  box-shadow: 0 2px 8px rgba(102, 126, 234, 0.2);
}

.link-icon {
  margin-right: 10px;
  font-size: 1.2rem;
}

.link-text {
  flex: 1;
  font-size: 0.95rem;
  word-break: break-word;
}

.external-icon {
  opacity: 0.5;
  font-size: 0.8rem;
}

.no-results {
  text-align: center;
  padding: 60px 20px;
  color: #666;
}

.no-results-icon {
  font-size: 4rem;
  margin-bottom: 20px;
}

.loading {
  text-align: center;
  padding: 40px;
  color: #666;
  font-size: 1.2rem;
}

footer {
  text-align: center;
  color: white;
  margin-top: 40px;
  padding: 20px;
  opacity: 0.8;
}

footer a {
  color: white;
  text-decoration: underline;
}

@media (max-width: 768px) {
  h1 {
    font-size: 1.8rem;
  }

  .episode-meta {
    flex-direction: column;
    align-items: flex-start;
  }
}
`
